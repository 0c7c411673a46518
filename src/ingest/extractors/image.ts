import sharp from 'sharp';
import { ExtractionError, errorMessage } from '../../errors.js';
import { normalizeText } from '../../utils/text.js';
import { readInputFile } from './input.js';
import type { Extractor } from './types.js';

export const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg'];

export const imageExtractor: Extractor = {
  modality: 'image',

  async extract(input, { config, run }) {
    const content = await readInputFile(input.location);

    let info: sharp.Metadata;
    try {
      info = await sharp(content).metadata();
    } catch (error) {
      throw new ExtractionError(`Could not read image ${input.origin}: ${errorMessage(error)}`, { cause: error });
    }
    if (!info.width || !info.height) throw new ExtractionError(`Image ${input.origin} has no dimensions`);

    const metadata = {
      format: info.format ?? input.extension.slice(1),
      width: info.width,
      height: info.height,
      channels: info.channels ?? null,
      bytes: content.length,
      imagePath: input.location
    };

    if (!config.capabilities.ocr) {
      return {
        text: '',
        metadata: { ...metadata, ocrSkipped: true, ocrSkipReason: 'OCR engine not installed' },
        warnings: [`OCR unavailable; stored ${input.origin} without text`]
      };
    }

    try {
      const { stdout } = await run(config.tools.tesseract, [input.location, 'stdout'], { timeoutMs: config.tools.timeoutMs });
      return {
        text: normalizeText(stdout),
        metadata: { ...metadata, ocrEngine: 'tesseract' }
      };
    } catch (error) {
      return {
        text: '',
        metadata: { ...metadata, ocrSkipped: true, ocrError: errorMessage(error) },
        warnings: [`OCR failed for ${input.origin}: ${errorMessage(error)}`]
      };
    }
  }
};
