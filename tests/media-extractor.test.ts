import { writeFileSync } from 'node:fs';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { canTranscribe, probeCapabilities } from '../src/capabilities.js';
import { ExtractionError } from '../src/errors.js';
import { audioExtractor, videoExtractor } from '../src/ingest/extractors/media.js';
import { CommandError } from '../src/utils/command.js';
import { fakeRunner, makeTempDir, testConfig, type TempDir } from './helpers.js';

const TOOLS_ON = { ffmpeg: true, ffprobe: true, whisper: true };

/** Answers like ffmpeg, ffprobe and whisper-cli would, writing the transcript whisper leaves behind. */
function mediaTools(transcript: string) {
  return fakeRunner((command, args) => {
    if (command === 'ffprobe') return { stdout: '12.4\n', stderr: '' };
    if (command === 'whisper-cli') {
      const stem = args[args.indexOf('-of') + 1];
      writeFileSync(`${stem}.txt`, transcript);
    }
    return { stdout: '', stderr: '' };
  });
}

describe('media extractor', () => {
  let tmp: TempDir;

  beforeEach(() => {
    tmp = makeTempDir();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it('stores audio without text when no transcription tools are installed', async () => {
    const path = tmp.file('memo.wav', 'RIFF fake');
    const { run, calls } = mediaTools('unused');

    const result = await audioExtractor.extract({ origin: 'memo.wav', location: path, extension: '.wav' }, { config: testConfig(), run });

    expect(calls).toEqual([]);
    expect(result.text).toBe('');
    expect(result.metadata).toEqual({
      format: 'wav',
      bytes: 9,
      transcriptionSkipped: true,
      transcriptionSkipReason: 'ffmpeg or whisper not installed'
    });
    expect(result.warnings).toEqual(['Transcription unavailable for memo.wav: ffmpeg or whisper not installed']);
  });

  it('decodes, probes and transcribes audio', async () => {
    const path = tmp.file('memo.mp3', 'ID3 fake');
    const { run, calls } = mediaTools('Hello from the recording.  [BLANK_AUDIO]\n');
    const config = testConfig({ capabilities: TOOLS_ON, whisperModelPath: '/models/ggml-base.bin' });

    const result = await audioExtractor.extract({ origin: 'memo.mp3', location: path, extension: '.mp3' }, { config, run });

    expect(calls.map((c) => c.command)).toEqual(['ffmpeg', 'ffprobe', 'whisper-cli']);
    expect(calls[0].args.slice(0, 5)).toEqual(['-y', '-loglevel', 'error', '-i', path]);
    expect(calls[2].args.slice(0, 2)).toEqual(['-m', '/models/ggml-base.bin']);
    expect(result.text).toBe('Hello from the recording.');
    expect(result.metadata).toEqual({ format: 'mp3', bytes: 8, durationSeconds: 12, transcriptionEngine: 'whisper' });
    expect(result.warnings).toBeUndefined();
  });

  it('degrades when ffmpeg turns out to be missing', async () => {
    const path = tmp.file('clip.mp4', 'ftyp fake');
    const { run } = fakeRunner(() => {
      throw new CommandError('ffmpeg', 'Command not found: ffmpeg', true);
    });
    const config = testConfig({ capabilities: TOOLS_ON, whisperModelPath: '/models/ggml-base.bin' });

    const result = await videoExtractor.extract({ origin: 'clip.mp4', location: path, extension: '.mp4' }, { config, run });

    expect(result.text).toBe('');
    expect(result.metadata.transcriptionSkipReason).toBe('Command not found: ffmpeg');
  });

  it('fails on media ffmpeg cannot decode', async () => {
    const path = tmp.file('clip.mov', 'garbage');
    const { run } = fakeRunner(() => {
      throw new CommandError('ffmpeg', 'ffmpeg failed: Invalid data found when processing input', false);
    });
    const config = testConfig({ capabilities: TOOLS_ON, whisperModelPath: '/models/ggml-base.bin' });

    const attempt = videoExtractor.extract({ origin: 'clip.mov', location: path, extension: '.mov' }, { config, run });

    await expect(attempt).rejects.toBeInstanceOf(ExtractionError);
    await expect(attempt).rejects.toThrow(
      'Could not decode audio track of video clip.mov: ffmpeg failed: Invalid data found when processing input'
    );
  });

  it('keeps the record when whisper fails', async () => {
    const path = tmp.file('memo.wav', 'RIFF fake');
    const { run } = fakeRunner((command) => {
      if (command === 'whisper-cli') throw new CommandError('whisper-cli', 'whisper-cli failed: model load error', false);
      if (command === 'ffprobe') return { stdout: 'N/A\n', stderr: '' };
      return { stdout: '', stderr: '' };
    });
    const config = testConfig({ capabilities: TOOLS_ON, whisperModelPath: '/models/ggml-base.bin' });

    const result = await audioExtractor.extract({ origin: 'memo.wav', location: path, extension: '.wav' }, { config, run });

    expect(result.text).toBe('');
    expect(result.metadata).toEqual({
      format: 'wav',
      bytes: 9,
      durationSeconds: null,
      transcriptionSkipped: true,
      transcriptionError: 'whisper-cli failed: model load error'
    });
    expect(result.warnings).toEqual([
      'Transcription unavailable for memo.wav: transcription failed: whisper-cli failed: model load error'
    ]);
  });
});

describe('capability probe', () => {
  let tmp: TempDir;

  beforeEach(() => {
    tmp = makeTempDir();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it('reports each tool that answers and requires a whisper model file', async () => {
    const model = tmp.file('ggml-base.bin', 'model');
    const { run } = fakeRunner((command) => {
      if (command === 'tesseract') throw new CommandError('tesseract', 'Command not found: tesseract', true);
      return { stdout: 'ok', stderr: '' };
    });

    const withModel = await probeCapabilities(testConfig({ whisperModelPath: model }).tools, run);
    expect(withModel).toEqual({ ocr: false, ffmpeg: true, ffprobe: true, whisper: true, ytDlp: true });
    expect(canTranscribe(withModel)).toBe(true);

    const withoutModel = await probeCapabilities(testConfig().tools, run);
    expect(withoutModel.whisper).toBe(false);
    expect(canTranscribe(withoutModel)).toBe(false);
  });
});
