import type Database from 'better-sqlite3';

export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS text_chunks (
      chunk_id TEXT PRIMARY KEY,
      section_id TEXT NOT NULL,
      source_document TEXT NOT NULL,
      content TEXT NOT NULL,
      embedding_json TEXT,
      metadata_json TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS image_chunks (
      chunk_id TEXT PRIMARY KEY,
      section_id TEXT NOT NULL,
      source_document TEXT NOT NULL,
      image_type TEXT NOT NULL,
      image_summary TEXT NOT NULL,
      embedding_json TEXT,
      metadata_json TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS table_chunks (
      chunk_id TEXT PRIMARY KEY,
      section_id TEXT NOT NULL,
      source_document TEXT NOT NULL,
      table_name TEXT NOT NULL,
      sql_definition TEXT NOT NULL,
      metadata_json TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS jobs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      job_type TEXT NOT NULL,
      status TEXT NOT NULL,
      payload_json TEXT,
      error_text TEXT,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS settings (
      key TEXT PRIMARY KEY,
      value_json TEXT NOT NULL,
      updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS event_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      job_id INTEGER,
      source_document TEXT,
      level TEXT NOT NULL,
      event_type TEXT NOT NULL,
      event_json TEXT,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY(job_id) REFERENCES jobs(id)
    );

    CREATE TABLE IF NOT EXISTS job_metrics (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      job_id INTEGER,
      metric_name TEXT NOT NULL,
      metric_value REAL NOT NULL,
      labels_json TEXT,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY(job_id) REFERENCES jobs(id)
    );

    CREATE INDEX IF NOT EXISTS idx_text_chunks_source ON text_chunks(source_document);
    CREATE INDEX IF NOT EXISTS idx_image_chunks_source ON image_chunks(source_document);
    CREATE INDEX IF NOT EXISTS idx_table_chunks_source ON table_chunks(source_document);
    CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);
    CREATE INDEX IF NOT EXISTS idx_event_logs_job_id ON event_logs(job_id);
    CREATE INDEX IF NOT EXISTS idx_job_metrics_job_id ON job_metrics(job_id);
  `);

  try {
    db.pragma('journal_mode = WAL');
  } catch {
    // in-memory databases keep their own journal mode
  }
}
