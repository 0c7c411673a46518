import { JSDOM } from 'jsdom';
import JSZip from 'jszip';
import mammoth from 'mammoth';
import { ExtractionError, errorMessage } from '../../errors.js';
import { flattenMarkdown, normalizeText } from '../../utils/text.js';
import pdfParse from './pdf-parse.js';
import { readInputFile } from './input.js';
import type { ExtractedContent, Extractor } from './types.js';

type DocumentReader = (content: Buffer) => Promise<ExtractedContent>;

function decodeUtf8(content: Buffer): string {
  return content.toString('utf8').replace(/^\uFEFF/, '');
}

async function readPdf(content: Buffer): Promise<ExtractedContent> {
  const parsed = await pdfParse(content);
  return {
    text: normalizeText(parsed.text),
    metadata: { format: 'pdf', pages: parsed.numpages }
  };
}

async function readDocx(content: Buffer): Promise<ExtractedContent> {
  const result = await mammoth.extractRawText({ buffer: content });
  return {
    text: normalizeText(result.value),
    metadata: { format: 'docx', messages: result.messages.length }
  };
}

function slideNumber(name: string): number {
  const match = name.match(/slide(\d+)\.xml$/);
  return match ? Number(match[1]) : 0;
}

function slideText(xml: string): string {
  const doc = new JSDOM(xml, { contentType: 'text/xml' }).window.document;
  return Array.from(doc.getElementsByTagName('a:p'))
    .map((paragraph) =>
      Array.from(paragraph.getElementsByTagName('a:t'))
        .map((run) => run.textContent ?? '')
        .join('')
    )
    .filter((line) => line.trim().length > 0)
    .join('\n');
}

async function readPptx(content: Buffer): Promise<ExtractedContent> {
  const zip = await JSZip.loadAsync(content);
  if (!zip.file('ppt/presentation.xml')) throw new Error('archive has no ppt/presentation.xml');

  const slideNames = Object.keys(zip.files)
    .filter((name) => /^ppt\/slides\/slide\d+\.xml$/.test(name))
    .sort((a, b) => slideNumber(a) - slideNumber(b));

  const slides: string[] = [];
  for (const name of slideNames) {
    const xml = await zip.file(name)?.async('string');
    if (xml) slides.push(slideText(xml));
  }

  return {
    text: normalizeText(slides.filter(Boolean).join('\n\n')),
    metadata: { format: 'pptx', slides: slideNames.length }
  };
}

async function readMarkdown(content: Buffer): Promise<ExtractedContent> {
  return {
    text: normalizeText(flattenMarkdown(decodeUtf8(content))),
    metadata: { format: 'md' }
  };
}

async function readPlainText(content: Buffer): Promise<ExtractedContent> {
  return {
    text: normalizeText(decodeUtf8(content)),
    metadata: { format: 'txt' }
  };
}

const READERS: Record<string, DocumentReader> = {
  '.pdf': readPdf,
  '.docx': readDocx,
  '.pptx': readPptx,
  '.md': readMarkdown,
  '.txt': readPlainText
};

export const DOCUMENT_EXTENSIONS = Object.keys(READERS);

export const documentExtractor: Extractor = {
  modality: 'text-document',

  async extract(input) {
    const reader = READERS[input.extension];
    if (!reader) throw new ExtractionError(`No document reader for ${input.extension}`);

    const content = await readInputFile(input.location);
    let extracted: ExtractedContent;
    try {
      extracted = await reader(content);
    } catch (error) {
      throw new ExtractionError(
        `Could not read ${input.extension.slice(1).toUpperCase()} document ${input.origin}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    return {
      ...extracted,
      metadata: { ...extracted.metadata, bytes: content.length }
    };
  }
};
