import { join } from 'node:path';
import type { Capabilities } from './capabilities.js';
import { NO_CAPABILITIES } from './capabilities.js';

export type RetrievalMode = 'lexical' | 'hybrid';

export interface KBSettings {
  topK: number;
  excerptLength: number;
  relevanceFloor: number;
  retrievalMode: RetrievalMode;
  visionEnabled: boolean;
}

export interface SynthesizerConfig {
  apiKey: string | null;
  model: string;
  baseURL: string | null;
  temperature: number;
  retries: number;
  backoffMs: number;
  timeoutMs: number;
}

export interface ToolPaths {
  tesseract: string;
  ffmpeg: string;
  ffprobe: string;
  whisper: string;
  whisperModelPath: string | null;
  ytDlp: string;
  timeoutMs: number;
}

export interface KBConfig {
  dbPath: string;
  settings: KBSettings;
  synthesizer: SynthesizerConfig;
  embeddingModel: string;
  tools: ToolPaths;
  capabilities: Capabilities;
}

export const DEFAULT_DB_PATH = join(process.cwd(), 'data', 'kb.sqlite');

type Env = Record<string, string | undefined>;

function numberFrom(value: string | undefined, fallback: number, { min = 0 }: { min?: number } = {}): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function booleanFrom(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return value.trim().toLowerCase() === 'true';
}

function stringFrom(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function parseRetrievalMode(value: string | undefined): RetrievalMode | null {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'lexical' || normalized === 'hybrid') return normalized;
  return null;
}

export function defaultSettings(env: Env = process.env): KBSettings {
  return {
    topK: Math.floor(numberFrom(env.KB_TOP_K, 4, { min: 1 })),
    excerptLength: Math.floor(numberFrom(env.KB_EXCERPT_LENGTH, 1500, { min: 50 })),
    relevanceFloor: numberFrom(env.KB_RELEVANCE_FLOOR, 0),
    retrievalMode: parseRetrievalMode(env.KB_RETRIEVAL_MODE) ?? 'lexical',
    visionEnabled: booleanFrom(env.KB_VISION_ENABLED, true)
  };
}

export function loadConfig(env: Env = process.env): KBConfig {
  return {
    dbPath: stringFrom(env.KB_DB_PATH) ?? DEFAULT_DB_PATH,
    settings: defaultSettings(env),
    synthesizer: {
      apiKey: stringFrom(env.OPENAI_API_KEY),
      model: stringFrom(env.KB_SYNTH_MODEL) ?? 'gpt-4o-mini',
      baseURL: stringFrom(env.KB_SYNTH_BASE_URL),
      temperature: numberFrom(env.KB_SYNTH_TEMPERATURE, 0.2),
      retries: Math.floor(numberFrom(env.KB_SYNTH_RETRIES, 2)),
      backoffMs: numberFrom(env.KB_SYNTH_BACKOFF_MS, 500),
      timeoutMs: numberFrom(env.KB_SYNTH_TIMEOUT_MS, 60000, { min: 1 })
    },
    embeddingModel: stringFrom(env.OPENAI_EMBEDDING_MODEL) ?? 'text-embedding-3-small',
    tools: {
      tesseract: stringFrom(env.KB_TESSERACT_BIN) ?? 'tesseract',
      ffmpeg: stringFrom(env.KB_FFMPEG_BIN) ?? 'ffmpeg',
      ffprobe: stringFrom(env.KB_FFPROBE_BIN) ?? 'ffprobe',
      whisper: stringFrom(env.KB_WHISPER_BIN) ?? 'whisper-cli',
      whisperModelPath: stringFrom(env.KB_WHISPER_MODEL_PATH),
      ytDlp: stringFrom(env.KB_YTDLP_BIN) ?? 'yt-dlp',
      timeoutMs: numberFrom(env.KB_TOOL_TIMEOUT_MS, 600000, { min: 1 })
    },
    capabilities: { ...NO_CAPABILITIES }
  };
}
