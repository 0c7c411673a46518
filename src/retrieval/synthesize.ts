import type { ContextBundle, ImageReference } from '../types.js';
import { queryTerms, truncateExcerpt } from '../utils/text.js';

export interface SynthesisRequest {
  question: string;
  context: ContextBundle;
  images: ImageReference[];
}

/**
 * Produces an answer from a question and its retrieved context. Implementations
 * may be remote; callers wrap them in timeout and retry and honour `signal`.
 */
export interface AnswerSynthesizer {
  readonly name: string;
  readonly supportsImages: boolean;
  synthesize(request: SynthesisRequest, signal?: AbortSignal): Promise<string>;
  /** Whether a failed attempt is worth repeating. Defaults to yes. */
  isRetryable?(error: unknown): boolean;
}

const MAX_QUOTES = 6;
const MAX_QUOTE_CHARS = 240;
const MIN_SENTENCE_CHARS = 10;

// A period after one of these does not end a sentence.
const ABBREVIATIONS = new Set(['mr', 'mrs', 'ms', 'dr', 'jr', 'sr', 'inc', 'ltd', 'co', 'vs', 'etc', 'e.g', 'i.e', 'approx']);

export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  let current: string[] = [];

  for (const word of text.split(/\s+/)) {
    if (!word) continue;
    current.push(word);
    if (!/[.!?]["')\]]*$/.test(word)) continue;
    const bare = word.replace(/^[^\p{L}\p{N}]+/u, '').replace(/\.$/, '').toLowerCase();
    if (word.endsWith('.') && ABBREVIATIONS.has(bare)) continue;
    sentences.push(current.join(' '));
    current = [];
  }
  if (current.length) sentences.push(current.join(' '));

  return sentences.filter((sentence) => sentence.length >= MIN_SENTENCE_CHARS);
}

/** Keeps the first of any items whose letters and digits repeat or contain an earlier one's. */
export function deduplicateSpans<T>(items: T[], textOf: (item: T) => string): T[] {
  const kept: Array<{ item: T; key: string }> = [];
  for (const item of items) {
    const key = textOf(item).toLowerCase().replace(/[^\p{L}\p{N}]/gu, '');
    if (kept.some((k) => k.key.includes(key) || key.includes(k.key))) continue;
    kept.push({ item, key });
  }
  return kept.map((k) => k.item);
}

export interface Quote {
  text: string;
  /** 1-based position of the source in the context bundle. */
  citation: number;
  hits: number;
}

/**
 * Sentences that mention the most query terms. Ties go to the better ranked
 * source, then the earlier sentence. Without any match every sentence is a candidate.
 */
export function selectQuotes(context: ContextBundle, question: string, limit = MAX_QUOTES): Quote[] {
  const terms = queryTerms(question);
  const candidates: Quote[] = [];

  context.forEach((entry, index) => {
    const sentences = splitSentences(entry.excerpt);
    if (!sentences.length && entry.excerpt.trim()) sentences.push(entry.excerpt.trim());
    for (const text of sentences) {
      const lower = text.toLowerCase();
      candidates.push({ text, citation: index + 1, hits: terms.filter((term) => lower.includes(term)).length });
    }
  });

  const matching = candidates.filter((q) => q.hits > 0);
  const pool = (matching.length ? matching : candidates).sort((a, b) => b.hits - a.hits);
  return deduplicateSpans(pool, (q) => q.text).slice(0, limit);
}

/** Answers by quoting the most relevant sentences of the bundle, with numbered citations. */
export class ExtractiveSynthesizer implements AnswerSynthesizer {
  readonly name = 'extractive';
  readonly supportsImages = false;

  async synthesize({ question, context }: SynthesisRequest): Promise<string> {
    const lines = selectQuotes(context, question).map((q) => `- ${truncateExcerpt(q.text, MAX_QUOTE_CHARS)} [${q.citation}]`);

    if (context.length) {
      lines.push('', 'Sources:');
      context.forEach((entry, i) => lines.push(`[${i + 1}] ${entry.origin}`));
    }

    return lines.join('\n');
  }
}
