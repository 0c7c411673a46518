import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { YoutubeTranscript } from 'youtube-transcript';
import { canTranscribe } from '../../capabilities.js';
import { ExtractionError, errorMessage } from '../../errors.js';
import { normalizeText } from '../../utils/text.js';
import { canonicalYoutubeUrl, youtubeVideoId } from '../../utils/youtube.js';
import { decodeToWav, probeDuration, transcribeWav, withTempDir } from './transcribe.js';
import type { ExtractedContent, Extractor, ExtractorContext } from './types.js';

const ENTITIES: Record<string, string> = { amp: '&', lt: '<', gt: '>', quot: '"', apos: "'", nbsp: ' ' };

function decodeEntities(text: string): string {
  // Caption payloads are sometimes double-escaped (&amp;#39;).
  const once = (value: string) =>
    value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
      if (entity.startsWith('#')) {
        const code = /^#x/i.test(entity) ? parseInt(entity.slice(2), 16) : Number(entity.slice(1));
        return code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match;
      }
      return ENTITIES[entity.toLowerCase()] ?? match;
    });
  return once(once(text));
}

async function fetchTitle(url: string): Promise<string | null> {
  try {
    const res = await fetch(`https://www.youtube.com/oembed?format=json&url=${encodeURIComponent(url)}`);
    if (!res.ok) return null;
    const body: unknown = await res.json();
    if (body && typeof body === 'object' && 'title' in body && typeof body.title === 'string') return body.title.trim() || null;
    return null;
  } catch {
    return null;
  }
}

function withTitle(title: string | null, transcript: string): string {
  return title ? `Title: ${title}\n\n${transcript}` : transcript;
}

async function transcribeDownload(url: string, ctx: ExtractorContext): Promise<{ text: string; durationSeconds: number | null }> {
  const { config, run } = ctx;
  return withTempDir(async (dir) => {
    await run(
      config.tools.ytDlp,
      ['-f', 'bestaudio/best', '-x', '--audio-format', 'wav', '--no-playlist', '--quiet', '-o', join(dir, 'download.%(ext)s'), url],
      { timeoutMs: config.tools.timeoutMs }
    );
    const downloaded = (await readdir(dir)).find((name) => name.startsWith('download.'));
    if (!downloaded) throw new Error('yt-dlp produced no audio file');

    const source = join(dir, downloaded);
    const wavPath = join(dir, 'audio.wav');
    await decodeToWav(source, wavPath, ctx);
    const durationSeconds = await probeDuration(source, ctx);
    const text = await transcribeWav(wavPath, join(dir, 'transcript'), ctx);
    return { text, durationSeconds };
  });
}

export const youtubeExtractor: Extractor = {
  modality: 'youtube-link',

  async extract(input, ctx): Promise<ExtractedContent> {
    const videoId = youtubeVideoId(input.location);
    if (!videoId) throw new ExtractionError(`Could not parse a YouTube video id from ${input.origin}`);
    const url = canonicalYoutubeUrl(videoId);

    let captionError: unknown;
    try {
      const segments = await YoutubeTranscript.fetchTranscript(videoId);
      const transcript = normalizeText(segments.map((segment) => decodeEntities(segment.text)).join(' ').replace(/\s+/g, ' '));
      if (transcript) {
        const title = await fetchTitle(url);
        return {
          text: withTitle(title, transcript),
          metadata: { videoId, url, title, transcriptSource: 'captions', segments: segments.length }
        };
      }
      captionError = new Error('caption track is empty');
    } catch (error) {
      captionError = error;
    }

    const { capabilities } = ctx.config;
    if (capabilities.ytDlp && canTranscribe(capabilities)) {
      let downloaded: { text: string; durationSeconds: number | null };
      try {
        downloaded = await transcribeDownload(url, ctx);
      } catch (error) {
        throw new ExtractionError(`Could not download or transcribe ${url}: ${errorMessage(error)}`, { cause: error });
      }
      const title = await fetchTitle(url);
      return {
        text: withTitle(title, downloaded.text),
        metadata: {
          videoId,
          url,
          title,
          transcriptSource: 'audio',
          durationSeconds: downloaded.durationSeconds,
          captionError: errorMessage(captionError)
        }
      };
    }

    return {
      text: '',
      metadata: { videoId, url, transcriptionSkipped: true, transcriptError: errorMessage(captionError) },
      warnings: [`No captions for ${url} and no local transcription tools: ${errorMessage(captionError)}`]
    };
  }
};
