import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ExtractorContext } from './types.js';
import { normalizeText } from '../../utils/text.js';

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'kb-media-'));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** Decodes any audio or video input to 16 kHz mono PCM, the format whisper expects. */
export async function decodeToWav(source: string, wavPath: string, { config, run }: ExtractorContext): Promise<void> {
  await run(
    config.tools.ffmpeg,
    ['-y', '-loglevel', 'error', '-i', source, '-vn', '-ac', '1', '-ar', '16000', '-acodec', 'pcm_s16le', wavPath],
    { timeoutMs: config.tools.timeoutMs }
  );
}

export async function probeDuration(path: string, { config, run }: ExtractorContext): Promise<number | null> {
  if (!config.capabilities.ffprobe) return null;
  try {
    const { stdout } = await run(
      config.tools.ffprobe,
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=nw=1:nk=1', path],
      { timeoutMs: 30000 }
    );
    const value = Number(stdout.trim());
    return Number.isFinite(value) ? Math.round(value) : null;
  } catch {
    return null;
  }
}

export async function transcribeWav(wavPath: string, outputStem: string, { config, run }: ExtractorContext): Promise<string> {
  const modelPath = config.tools.whisperModelPath;
  if (!modelPath) throw new Error('whisper model path is not configured');

  await run(config.tools.whisper, ['-m', modelPath, '-f', wavPath, '-otxt', '-of', outputStem, '-np'], {
    timeoutMs: config.tools.timeoutMs
  });

  const raw = await readFile(`${outputStem}.txt`, 'utf8');
  return normalizeText(raw.replace(/\[BLANK_AUDIO\]/g, ' '));
}
