import { z } from 'zod';
import type { DBContext } from './client.js';
import { defaultSettings, type RagSettings } from '../config.js';

const SETTINGS_KEY = 'rag_settings_v1';

const storedSettings = z
  .object({
    rerankStrategy: z.enum(['multi_signal', 'cross_encoder']),
    retrievalTopK: z.number().int().positive(),
    rerankTopK: z.number().int().positive()
  })
  .partial();

export function getSettings(ctx: DBContext): RagSettings {
  const defaults = defaultSettings();
  const row = ctx.db.prepare('SELECT value_json FROM settings WHERE key = ?').get(SETTINGS_KEY) as { value_json: string } | undefined;
  if (!row) return defaults;
  try {
    const parsed = storedSettings.safeParse(JSON.parse(row.value_json));
    return parsed.success ? { ...defaults, ...parsed.data } : defaults;
  } catch {
    return defaults;
  }
}

export function updateSettings(ctx: DBContext, patch: Partial<RagSettings>): RagSettings {
  const next = { ...getSettings(ctx), ...patch };
  ctx.db
    .prepare(
      `INSERT INTO settings (key, value_json, updated_at) VALUES (?, ?, CURRENT_TIMESTAMP)
       ON CONFLICT(key) DO UPDATE SET value_json = excluded.value_json, updated_at = CURRENT_TIMESTAMP`
    )
    .run(SETTINGS_KEY, JSON.stringify(next));
  return next;
}
