import { DBContext } from '../db/client.js';
import { recordQuery } from '../db/queries.js';
import { listChunks, listProcessedSources, searchSources } from '../db/sources.js';
import type { KBSettings, RetrievalMode } from '../config.js';
import { SynthesisUnavailableError } from '../errors.js';
import { logIngestEvent, recordJobMetric } from '../observability.js';
import type { ChunkRecord, ContextBundle, ContextEntry, ImageReference, QueryAnswer, SourceRecord } from '../types.js';
import { RetryExhaustedError, withRetry } from '../utils/retry.js';
import { queryTerms, tokenize, truncateExcerpt } from '../utils/text.js';
import { cosineSimilarity, localEmbedder, type Embedder } from './embeddings.js';
import { finalRank, getRankingWeights, lexicalScore, type RankingWeights } from './ranking.js';
import type { AnswerSynthesizer } from './synthesize.js';

export const NO_CONTEXT_ANSWER =
  'No relevant content found in the processed sources. Process some files first, or rephrase the question.';

const VISUAL_INTENT = /\b(image|images|picture|pictures|photo|photos|screenshot|screenshots|diagram|diagrams|chart|figure|logo|describe|show)\b/i;
const DEFAULT_MAX_IMAGES = 3;

export interface RetrieveOptions {
  topK: number;
  excerptLength: number;
  relevanceFloor: number;
  mode: RetrievalMode;
  weights?: RankingWeights;
  embed?: Embedder;
}

interface ScoredCandidate {
  record: SourceRecord;
  chunk: ChunkRecord;
  score: number;
}

function bestChunk(
  record: SourceRecord,
  chunks: ChunkRecord[],
  score: (chunk: ChunkRecord) => number
): ScoredCandidate | null {
  let best: ScoredCandidate | null = null;
  for (const chunk of chunks) {
    const s = score(chunk);
    if (!best || s > best.score) best = { record, chunk, score: s };
  }
  return best;
}

/**
 * Selects up to `topK` processed sources relevant to the question, each
 * represented by its best-scoring chunk. Ties keep insertion order.
 */
export async function retrieve(ctx: DBContext, question: string, options: RetrieveOptions): Promise<ContextBundle> {
  const terms = queryTerms(question);
  if (!terms.length || options.topK < 1) return [];

  const hybrid = options.mode === 'hybrid';
  const candidates = hybrid ? listProcessedSources(ctx) : searchSources(ctx, terms);
  if (!candidates.length) return [];

  const weights = options.weights ?? getRankingWeights();
  const query = hybrid ? await (options.embed ?? localEmbedder)([question]) : null;
  const queryVector = query?.vectors[0] ?? [];
  // Chunks embedded by another model, keyed by that model (or their length when it was not recorded).
  const mismatched = new Set<string>();

  const semanticScore = (chunk: ChunkRecord): number => {
    if (!query || !chunk.embedding) return 0;
    const sameModel = chunk.embedding_model === null || chunk.embedding_model === query.model;
    if (!sameModel || chunk.embedding.length !== queryVector.length) {
      mismatched.add(chunk.embedding_model ?? `${chunk.embedding.length} dimensions`);
      return 0;
    }
    return cosineSimilarity(queryVector, chunk.embedding);
  };

  const scoreChunk = (chunk: ChunkRecord): number => {
    const lexical = lexicalScore(terms, new Set(tokenize(chunk.text)));
    return hybrid ? finalRank(lexical, semanticScore(chunk), weights) : lexical;
  };

  const scored: ScoredCandidate[] = [];
  for (const record of candidates) {
    if (record.status !== 'processed') continue;
    const best = bestChunk(record, listChunks(ctx, record.id), scoreChunk);
    if (best && best.score > options.relevanceFloor) scored.push(best);
  }

  if (query && mismatched.size) {
    logIngestEvent(ctx, {
      level: 'warn',
      eventType: 'embedding_mismatch',
      event: { queryModel: query.model, queryDimensions: queryVector.length, chunkModels: Array.from(mismatched) }
    });
  }

  // Array.prototype.sort is stable; candidates arrive in insertion order.
  scored.sort((a, b) => b.score - a.score);

  return scored.slice(0, options.topK).map(
    ({ record, chunk, score }): ContextEntry => ({
      source_id: record.id,
      origin: record.origin,
      modality: record.modality,
      excerpt: truncateExcerpt(chunk.text, options.excerptLength),
      score
    })
  );
}

export function hasVisualIntent(question: string): boolean {
  return VISUAL_INTENT.test(question);
}

/** Processed images whose OCR produced nothing, newest last, for a vision-capable synthesizer. */
export function imageReferences(ctx: DBContext, limit = DEFAULT_MAX_IMAGES): ImageReference[] {
  const refs: ImageReference[] = [];
  for (const record of listProcessedSources(ctx)) {
    if (record.modality !== 'image' || record.extracted_text.trim()) continue;
    const path = record.raw_metadata.imagePath;
    if (typeof path === 'string' && path) refs.push({ source_id: record.id, origin: record.origin, path });
  }
  return refs.slice(-limit);
}

export interface QueryDeps {
  settings: KBSettings;
  synthesizer: AnswerSynthesizer;
  synthesis: { retries: number; backoffMs: number; timeoutMs: number };
  embed?: Embedder;
  weights?: RankingWeights;
  maxImages?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Retrieves context and asks the synthesizer. An empty bundle is answered
 * locally without calling it. Every outcome is written to the query history.
 */
export async function answerQuestion(ctx: DBContext, question: string, deps: QueryDeps): Promise<QueryAnswer> {
  const started = Date.now();
  const { settings, synthesizer } = deps;

  const context = await retrieve(ctx, question, {
    topK: settings.topK,
    excerptLength: settings.excerptLength,
    relevanceFloor: settings.relevanceFloor,
    mode: settings.retrievalMode,
    weights: deps.weights,
    embed: deps.embed
  });

  const images =
    settings.visionEnabled && synthesizer.supportsImages && hasVisualIntent(question)
      ? imageReferences(ctx, deps.maxImages ?? DEFAULT_MAX_IMAGES)
      : [];

  const sourceIds = Array.from(new Set([...context.map((entry) => entry.source_id), ...images.map((image) => image.source_id)]));

  if (!context.length && !images.length) {
    recordQuery(ctx, { question, answer: NO_CONTEXT_ANSWER, sourceIds: [], status: 'no_context', durationMs: Date.now() - started });
    return { answer: NO_CONTEXT_ANSWER, sourceIds: [], status: 'no_context' };
  }

  const synthesisStarted = Date.now();
  try {
    const answer = await withRetry((signal) => synthesizer.synthesize({ question, context, images }, signal), {
      ...deps.synthesis,
      shouldRetry: (error) => synthesizer.isRetryable?.(error) ?? true,
      sleep: deps.sleep
    });

    recordJobMetric(ctx, {
      metricName: 'synthesis_ms',
      metricValue: Date.now() - synthesisStarted,
      labels: { synthesizer: synthesizer.name, status: 'answered', sources: sourceIds.length }
    });
    recordQuery(ctx, { question, answer, sourceIds, status: 'answered', durationMs: Date.now() - started });
    return { answer, sourceIds, status: 'answered' };
  } catch (error) {
    recordJobMetric(ctx, {
      metricName: 'synthesis_ms',
      metricValue: Date.now() - synthesisStarted,
      labels: { synthesizer: synthesizer.name, status: 'failed' }
    });
    recordQuery(ctx, { question, answer: null, sourceIds, status: 'failed', durationMs: Date.now() - started });
    if (error instanceof RetryExhaustedError) throw new SynthesisUnavailableError(error.attempts, error.lastError);
    throw error;
  }
}
