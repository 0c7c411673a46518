import { DBContext } from './client.js';
import { KBSettings, parseRetrievalMode } from '../config.js';

const SETTINGS_KEY = 'retrieval_settings_v1';

export const SETTING_KEYS = ['topK', 'excerptLength', 'relevanceFloor', 'retrievalMode', 'visionEnabled'] as const;
export type SettingKey = (typeof SETTING_KEYS)[number];

function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some((k) => k === key);
}

/** Keeps only well-formed overrides; anything else falls back to the configured default. */
function sanitize(raw: unknown): Partial<KBSettings> {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) return {};
  const out: Partial<KBSettings> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key === 'topK' && typeof value === 'number' && Number.isInteger(value) && value >= 1) out.topK = value;
    if (key === 'excerptLength' && typeof value === 'number' && Number.isInteger(value) && value >= 50) out.excerptLength = value;
    if (key === 'relevanceFloor' && typeof value === 'number' && Number.isFinite(value) && value >= 0) out.relevanceFloor = value;
    if (key === 'retrievalMode' && typeof value === 'string') {
      const mode = parseRetrievalMode(value);
      if (mode) out.retrievalMode = mode;
    }
    if (key === 'visionEnabled' && typeof value === 'boolean') out.visionEnabled = value;
  }
  return out;
}

function readOverrides(ctx: DBContext): Partial<KBSettings> {
  const row = ctx.db.prepare<[string], { value_json: string }>('SELECT value_json FROM settings WHERE key = ?').get(SETTINGS_KEY);
  if (!row) return {};
  try {
    return sanitize(JSON.parse(row.value_json));
  } catch {
    return {};
  }
}

export function getSettings(ctx: DBContext, defaults: KBSettings): KBSettings {
  return { ...defaults, ...readOverrides(ctx) };
}

/** Persists only the overrides, so later changes to the environment still apply to untouched keys. */
export function updateSettings(ctx: DBContext, defaults: KBSettings, patch: Partial<KBSettings>): KBSettings {
  const overrides = { ...readOverrides(ctx), ...sanitize(patch) };
  ctx.db
    .prepare(
      `INSERT INTO settings (key, value_json, updated_at) VALUES (?, ?, CURRENT_TIMESTAMP)
       ON CONFLICT(key) DO UPDATE SET value_json = excluded.value_json, updated_at = CURRENT_TIMESTAMP`
    )
    .run(SETTINGS_KEY, JSON.stringify(overrides));
  return { ...defaults, ...overrides };
}

export function resetSettings(ctx: DBContext, defaults: KBSettings): KBSettings {
  ctx.db.prepare('DELETE FROM settings WHERE key = ?').run(SETTINGS_KEY);
  return { ...defaults };
}

/** Parses a `config set <key> <value>` pair from the command line. */
export function parseSettingValue(key: string, value: string): Partial<KBSettings> {
  if (!isSettingKey(key)) {
    throw new Error(`Unknown setting "${key}". Expected one of: ${SETTING_KEYS.join(', ')}`);
  }

  const patch = sanitize({ [key]: coerce(key, value.trim()) });
  if (!(key in patch)) throw new Error(`Invalid value for ${key}: ${value}`);
  return patch;
}

function coerce(key: SettingKey, value: string): unknown {
  switch (key) {
    case 'topK':
    case 'excerptLength':
    case 'relevanceFloor':
      return value === '' ? Number.NaN : Number(value);
    case 'visionEnabled':
      if (value === 'true' || value === 'on') return true;
      if (value === 'false' || value === 'off') return false;
      return value;
    case 'retrievalMode':
      return value;
  }
}
