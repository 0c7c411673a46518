import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { defaultSettings, loadConfig } from '../src/config.js';
import { closeDB, initDB, type DBContext } from '../src/db/client.js';
import { getSettings, parseSettingValue, resetSettings, updateSettings } from '../src/db/settings.js';

describe('configuration', () => {
  it('reads defaults from the environment', () => {
    expect(defaultSettings({})).toEqual({
      topK: 4,
      excerptLength: 1500,
      relevanceFloor: 0,
      retrievalMode: 'lexical',
      visionEnabled: true
    });
    expect(
      defaultSettings({ KB_TOP_K: '7', KB_RETRIEVAL_MODE: 'Hybrid', KB_VISION_ENABLED: 'false', KB_RELEVANCE_FLOOR: '0.25' })
    ).toEqual({ topK: 7, excerptLength: 1500, relevanceFloor: 0.25, retrievalMode: 'hybrid', visionEnabled: false });
  });

  it('ignores malformed numbers', () => {
    const settings = defaultSettings({ KB_TOP_K: '0', KB_EXCERPT_LENGTH: 'long', KB_RETRIEVAL_MODE: 'vector' });
    expect(settings.topK).toBe(4);
    expect(settings.excerptLength).toBe(1500);
    expect(settings.retrievalMode).toBe('lexical');
  });

  it('only uses a remote synthesizer key when one is set', () => {
    expect(loadConfig({}).synthesizer.apiKey).toBeNull();
    expect(loadConfig({ OPENAI_API_KEY: '  ' }).synthesizer.apiKey).toBeNull();
    expect(loadConfig({ OPENAI_API_KEY: 'test-secret' }).synthesizer.apiKey).toBe('test-secret');
  });
});

describe('stored settings', () => {
  let ctx: DBContext;
  const defaults = defaultSettings({});

  beforeEach(() => {
    ctx = initDB(':memory:');
  });

  afterEach(() => {
    closeDB(ctx);
  });

  it('falls back to defaults when nothing is stored', () => {
    expect(getSettings(ctx, defaults)).toEqual(defaults);
  });

  it('persists overrides and merges them with later patches', () => {
    updateSettings(ctx, defaults, { topK: 2 });
    const next = updateSettings(ctx, defaults, { retrievalMode: 'hybrid' });

    expect(next).toEqual({ ...defaults, topK: 2, retrievalMode: 'hybrid' });
    expect(getSettings(ctx, { ...defaults, excerptLength: 300 })).toEqual({
      ...defaults,
      excerptLength: 300,
      topK: 2,
      retrievalMode: 'hybrid'
    });
  });

  it('drops invalid values from a patch', () => {
    expect(updateSettings(ctx, defaults, { topK: 0, excerptLength: 10.5, relevanceFloor: -1 })).toEqual(defaults);
  });

  it('resets to defaults', () => {
    updateSettings(ctx, defaults, { visionEnabled: false });
    expect(resetSettings(ctx, defaults)).toEqual(defaults);
    expect(getSettings(ctx, defaults)).toEqual(defaults);
  });

  it('ignores a corrupt stored value', () => {
    ctx.db.prepare("INSERT INTO settings (key, value_json) VALUES ('retrieval_settings_v1', '{broken')").run();
    expect(getSettings(ctx, defaults)).toEqual(defaults);
  });
});

describe('parseSettingValue', () => {
  it.each([
    ['topK', '3', { topK: 3 }],
    ['relevanceFloor', '0.2', { relevanceFloor: 0.2 }],
    ['retrievalMode', 'HYBRID', { retrievalMode: 'hybrid' }],
    ['visionEnabled', 'off', { visionEnabled: false }],
    ['visionEnabled', 'true', { visionEnabled: true }]
  ])('parses %s=%s', (key, value, patch) => {
    expect(parseSettingValue(key, value)).toEqual(patch);
  });

  it('rejects unknown keys and bad values', () => {
    expect(() => parseSettingValue('colour', 'blue')).toThrow(
      'Unknown setting "colour". Expected one of: topK, excerptLength, relevanceFloor, retrievalMode, visionEnabled'
    );
    expect(() => parseSettingValue('topK', 'many')).toThrow('Invalid value for topK: many');
    expect(() => parseSettingValue('excerptLength', '')).toThrow('Invalid value for excerptLength: ');
  });
});
