import { existsSync } from 'node:fs';
import type { ToolPaths } from './config.js';
import { runCommand, type CommandRunner } from './utils/command.js';

export interface Capabilities {
  ocr: boolean;
  ffmpeg: boolean;
  ffprobe: boolean;
  whisper: boolean;
  ytDlp: boolean;
}

export const NO_CAPABILITIES: Capabilities = {
  ocr: false,
  ffmpeg: false,
  ffprobe: false,
  whisper: false,
  ytDlp: false
};

const PROBE_TIMEOUT_MS = 5000;

async function responds(run: CommandRunner, command: string, args: string[]): Promise<boolean> {
  try {
    await run(command, args, { timeoutMs: PROBE_TIMEOUT_MS });
    return true;
  } catch {
    return false;
  }
}

/**
 * Checks once which local toolchains are installed. Extractors read the result
 * from the config instead of probing per file.
 */
export async function probeCapabilities(tools: ToolPaths, run: CommandRunner = runCommand): Promise<Capabilities> {
  const [ocr, ffmpeg, ffprobe, whisperBinary, ytDlp] = await Promise.all([
    responds(run, tools.tesseract, ['--version']),
    responds(run, tools.ffmpeg, ['-version']),
    responds(run, tools.ffprobe, ['-version']),
    responds(run, tools.whisper, ['--help']),
    responds(run, tools.ytDlp, ['--version'])
  ]);

  const whisperModel = tools.whisperModelPath !== null && existsSync(tools.whisperModelPath);

  return { ocr, ffmpeg, ffprobe, whisper: whisperBinary && whisperModel, ytDlp };
}

export function canTranscribe(capabilities: Capabilities): boolean {
  return capabilities.ffmpeg && capabilities.whisper;
}
