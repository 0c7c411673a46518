import { createHash } from 'node:crypto';
import { extname, resolve } from 'node:path';
import { UnsupportedModalityError } from '../errors.js';
import type { Modality } from '../types.js';
import { canonicalYoutubeUrl, isYouTubeUrl, youtubeVideoId } from '../utils/youtube.js';
import { DOCUMENT_EXTENSIONS, documentExtractor } from './extractors/document.js';
import { IMAGE_EXTENSIONS, imageExtractor } from './extractors/image.js';
import { AUDIO_EXTENSIONS, VIDEO_EXTENSIONS, audioExtractor, videoExtractor } from './extractors/media.js';
import type { Extractor } from './extractors/types.js';
import { youtubeExtractor } from './extractors/youtube.js';

export const EXTENSION_MODALITIES: ReadonlyMap<string, Modality> = new Map<string, Modality>([
  ...DOCUMENT_EXTENSIONS.map((ext): [string, Modality] => [ext, 'text-document']),
  ...IMAGE_EXTENSIONS.map((ext): [string, Modality] => [ext, 'image']),
  ...AUDIO_EXTENSIONS.map((ext): [string, Modality] => [ext, 'audio']),
  ...VIDEO_EXTENSIONS.map((ext): [string, Modality] => [ext, 'video'])
]);

export const EXTRACTORS: Record<Modality, Extractor> = {
  'text-document': documentExtractor,
  image: imageExtractor,
  audio: audioExtractor,
  video: videoExtractor,
  'youtube-link': youtubeExtractor
};

export interface ResolvedInput {
  id: string;
  /** What the user supplied, trimmed. */
  origin: string;
  modality: Modality;
  /** Absolute path for files, canonical watch URL for YouTube links with a video id. */
  location: string;
  extension: string;
}

export function sourceIdFor(canonical: string): string {
  return `src_${createHash('sha256').update(canonical).digest('hex').slice(0, 16)}`;
}

export function detectModality(input: string): Modality | null {
  const trimmed = input.trim();
  if (!trimmed) return null;
  if (isYouTubeUrl(trimmed)) return 'youtube-link';
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) return null;
  return EXTENSION_MODALITIES.get(extname(trimmed).toLowerCase()) ?? null;
}

/** Classifies an input without touching the filesystem or network. */
export function resolveInput(input: string, options: { id?: string } = {}): ResolvedInput {
  const origin = input.trim();
  const modality = detectModality(origin);
  if (!modality) throw new UnsupportedModalityError(origin);

  if (modality === 'youtube-link') {
    // Links without a video id still get a record; the extractor fails them.
    const videoId = youtubeVideoId(origin);
    const location = videoId ? canonicalYoutubeUrl(videoId) : origin;
    return { id: options.id ?? sourceIdFor(location), origin, modality, location, extension: '' };
  }

  const location = resolve(origin);
  return {
    id: options.id ?? sourceIdFor(location),
    origin,
    modality,
    location,
    extension: extname(location).toLowerCase()
  };
}
