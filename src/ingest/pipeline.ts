import { DBContext } from '../db/client.js';
import { findSource, upsertSource, type ChunkInput } from '../db/sources.js';
import type { KBConfig } from '../config.js';
import { ExtractionError, UnsupportedModalityError, errorMessage } from '../errors.js';
import { logIngestEvent, recordJobMetric } from '../observability.js';
import type { Embedder } from '../retrieval/embeddings.js';
import type { IngestionResult, Modality, SourceRecord } from '../types.js';
import { chunkText } from '../utils/chunking.js';
import { runCommand, type CommandRunner } from '../utils/command.js';
import { EXTRACTORS, resolveInput } from './dispatcher.js';
import type { Extractor } from './extractors/types.js';

export interface ProcessOptions {
  /** Explicit record id instead of the one derived from the origin. */
  id?: string;
  jobId?: number;
  /** Re-raise extraction failures after recording them. */
  throwOnFailure?: boolean;
  extractors?: Record<Modality, Extractor>;
  run?: CommandRunner;
  embed?: Embedder;
}

function now(): string {
  return new Date().toISOString();
}

function failureDetail(error: unknown): string {
  if (error instanceof ExtractionError) return error.message;
  return `Unexpected error during extraction: ${errorMessage(error)}`;
}

async function buildChunks(text: string, config: KBConfig, embed: Embedder | undefined): Promise<ChunkInput[] | undefined> {
  if (config.settings.retrievalMode !== 'hybrid' || !embed) return undefined;
  const texts = chunkText(text);
  const { model, vectors } = await embed(texts);
  return texts.map((chunk, i) => ({ text: chunk, embedding: vectors[i] ?? null, embeddingModel: model }));
}

/**
 * Detects the modality of one input, extracts it and stores the result.
 * Unsupported inputs throw before any record is written. Extraction failures
 * are recorded as failed records and only re-raised with `throwOnFailure`.
 */
export async function processInput(
  ctx: DBContext,
  config: KBConfig,
  input: string,
  options: ProcessOptions = {}
): Promise<IngestionResult> {
  const resolved = resolveInput(input, { id: options.id });
  const { id, origin, modality } = resolved;
  const extractor = (options.extractors ?? EXTRACTORS)[modality];

  const createdAt = findSource(ctx, id)?.created_at ?? now();
  upsertSource(ctx, {
    id,
    origin,
    modality,
    raw_metadata: {},
    extracted_text: '',
    status: 'pending',
    created_at: createdAt,
    updated_at: now()
  });

  const started = Date.now();
  try {
    const extracted = await extractor.extract(
      { origin, location: resolved.location, extension: resolved.extension },
      { config, run: options.run ?? runCommand }
    );
    recordJobMetric(ctx, {
      jobId: options.jobId,
      metricName: 'extract_ms',
      metricValue: Date.now() - started,
      labels: { modality, sourceId: id }
    });

    const record: SourceRecord = {
      id,
      origin,
      modality,
      raw_metadata: extracted.metadata,
      extracted_text: extracted.text,
      status: 'processed',
      created_at: createdAt,
      updated_at: now()
    };
    const chunks = await buildChunks(extracted.text, config, options.embed);
    upsertSource(ctx, record, chunks);

    const chunkCount = chunks?.length ?? chunkText(extracted.text).length;
    recordJobMetric(ctx, { jobId: options.jobId, metricName: 'chunks_created', metricValue: chunkCount, labels: { sourceId: id } });
    logIngestEvent(ctx, {
      jobId: options.jobId,
      sourceOrigin: origin,
      sourceId: id,
      eventType: 'source_processed',
      event: { modality, chars: extracted.text.length, chunks: chunkCount }
    });
    for (const warning of extracted.warnings ?? []) {
      logIngestEvent(ctx, {
        jobId: options.jobId,
        sourceOrigin: origin,
        sourceId: id,
        level: 'warn',
        eventType: 'degraded_extraction',
        event: { modality, message: warning }
      });
    }

    return { id, origin, modality, status: 'processed' };
  } catch (error) {
    const detail = failureDetail(error);
    upsertSource(ctx, {
      id,
      origin,
      modality,
      raw_metadata: {},
      extracted_text: '',
      status: 'failed',
      error_detail: detail,
      created_at: createdAt,
      updated_at: now()
    });
    logIngestEvent(ctx, {
      jobId: options.jobId,
      sourceOrigin: origin,
      sourceId: id,
      level: 'error',
      eventType: 'source_failed',
      event: { modality, message: detail }
    });

    if (options.throwOnFailure) throw error;
    return { id, origin, modality, status: 'failed', error_detail: detail };
  }
}

export interface BatchOptions extends Omit<ProcessOptions, 'id' | 'jobId' | 'throwOnFailure'> {
  signal?: AbortSignal;
  onResult?: (result: IngestionResult) => void;
}

export interface BatchSummary {
  jobId: number;
  status: 'done' | 'cancelled';
  results: IngestionResult[];
}

/**
 * Processes inputs one after another as a tracked job. The signal is checked
 * between inputs; the input in progress finishes and the rest are reported
 * as cancelled.
 */
export async function ingestBatch(
  ctx: DBContext,
  config: KBConfig,
  inputs: string[],
  options: BatchOptions = {}
): Promise<BatchSummary> {
  const { db } = ctx;
  const { signal, onResult, ...processOptions } = options;

  const job = db
    .prepare('INSERT INTO jobs (job_type, status, payload_json) VALUES (?, ?, ?)')
    .run('ingest_batch', 'running', JSON.stringify({ inputs }));
  const jobId = Number(job.lastInsertRowid);
  const started = Date.now();

  const results: IngestionResult[] = [];
  const report = (result: IngestionResult) => {
    results.push(result);
    onResult?.(result);
  };

  try {
    logIngestEvent(ctx, { jobId, eventType: 'job_started', event: { inputs: inputs.length } });

    for (const input of inputs) {
      if (signal?.aborted) {
        report({ id: null, origin: input.trim(), modality: null, status: 'cancelled' });
        continue;
      }
      try {
        report(await processInput(ctx, config, input, { ...processOptions, jobId }));
      } catch (error) {
        if (!(error instanceof UnsupportedModalityError)) throw error;
        logIngestEvent(ctx, {
          jobId,
          sourceOrigin: error.input,
          level: 'warn',
          eventType: 'unsupported_input',
          event: { message: error.message }
        });
        report({ id: null, origin: error.input, modality: null, status: 'unsupported', error_detail: error.message });
      }
    }

    const status = results.some((r) => r.status === 'cancelled') ? 'cancelled' : 'done';
    db.prepare('UPDATE jobs SET status = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?').run(status, jobId);
    recordJobMetric(ctx, { jobId, metricName: 'batch_duration_ms', metricValue: Date.now() - started });
    logIngestEvent(ctx, {
      jobId,
      eventType: status === 'done' ? 'job_completed' : 'job_cancelled',
      event: {
        processed: results.filter((r) => r.status === 'processed').length,
        failed: results.filter((r) => r.status === 'failed').length,
        unsupported: results.filter((r) => r.status === 'unsupported').length,
        cancelled: results.filter((r) => r.status === 'cancelled').length
      }
    });
    return { jobId, status, results };
  } catch (error) {
    db.prepare('UPDATE jobs SET status = ?, error_text = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?').run(
      'failed',
      errorMessage(error),
      jobId
    );
    logIngestEvent(ctx, { jobId, level: 'error', eventType: 'job_failed', event: { message: errorMessage(error) } });
    throw error;
  }
}
