import type { KBConfig } from '../../config.js';
import type { Modality, RawMetadata } from '../../types.js';
import type { CommandRunner } from '../../utils/command.js';

export interface ExtractionInput {
  origin: string;
  /** Absolute file path, or the canonical URL for links. */
  location: string;
  extension: string;
}

export interface ExtractedContent {
  text: string;
  metadata: RawMetadata;
  /** Degraded-mode notes; extraction still succeeded. */
  warnings?: string[];
}

export interface ExtractorContext {
  config: KBConfig;
  run: CommandRunner;
}

export interface Extractor {
  readonly modality: Modality;
  extract(input: ExtractionInput, ctx: ExtractorContext): Promise<ExtractedContent>;
}
