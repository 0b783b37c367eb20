import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';
import { DEFAULT_DB_PATH } from '../config.js';
import { runMigrations } from './migrations.js';

export interface DBContext {
  db: Database.Database;
}

export function initDB(dbPath = DEFAULT_DB_PATH): DBContext {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  runMigrations(db);
  return { db };
}
