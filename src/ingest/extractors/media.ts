import { join } from 'node:path';
import { canTranscribe } from '../../capabilities.js';
import { ExtractionError, errorMessage } from '../../errors.js';
import type { Modality } from '../../types.js';
import { CommandError } from '../../utils/command.js';
import { readInputFile } from './input.js';
import { decodeToWav, probeDuration, transcribeWav, withTempDir } from './transcribe.js';
import type { ExtractedContent, Extractor } from './types.js';

export const AUDIO_EXTENSIONS = ['.mp3', '.wav'];
export const VIDEO_EXTENSIONS = ['.mp4', '.mov'];

function skipped(format: string, bytes: number, reason: string, origin: string): ExtractedContent {
  return {
    text: '',
    metadata: { format, bytes, transcriptionSkipped: true, transcriptionSkipReason: reason },
    warnings: [`Transcription unavailable for ${origin}: ${reason}`]
  };
}

function createMediaExtractor(modality: Extract<Modality, 'audio' | 'video'>): Extractor {
  return {
    modality,

    async extract(input, ctx) {
      const content = await readInputFile(input.location);
      const format = input.extension.slice(1);

      if (!canTranscribe(ctx.config.capabilities)) {
        return skipped(format, content.length, 'ffmpeg or whisper not installed', input.origin);
      }

      return withTempDir(async (dir) => {
        const wavPath = join(dir, 'audio.wav');
        try {
          await decodeToWav(input.location, wavPath, ctx);
        } catch (error) {
          if (error instanceof CommandError && error.missing) {
            return skipped(format, content.length, error.message, input.origin);
          }
          const track = modality === 'video' ? 'audio track of video' : 'audio';
          throw new ExtractionError(`Could not decode ${track} ${input.origin}: ${errorMessage(error)}`, { cause: error });
        }

        const durationSeconds = await probeDuration(input.location, ctx);

        try {
          const text = await transcribeWav(wavPath, join(dir, 'transcript'), ctx);
          return {
            text,
            metadata: { format, bytes: content.length, durationSeconds, transcriptionEngine: 'whisper' }
          };
        } catch (error) {
          return {
            ...skipped(format, content.length, `transcription failed: ${errorMessage(error)}`, input.origin),
            metadata: {
              format,
              bytes: content.length,
              durationSeconds,
              transcriptionSkipped: true,
              transcriptionError: errorMessage(error)
            }
          };
        }
      });
    }
  };
}

export const audioExtractor = createMediaExtractor('audio');
export const videoExtractor = createMediaExtractor('video');
