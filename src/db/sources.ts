import { DBContext } from './client.js';
import { InvalidRecordError, NotFoundError } from '../errors.js';
import { ChunkRecord, MODALITIES, Modality, RawMetadata, SourceRecord } from '../types.js';
import { chunkText, simpleTokenCount } from '../utils/chunking.js';

interface SourceRow {
  seq: number;
  id: string;
  origin: string;
  modality: string;
  raw_metadata_json: string;
  extracted_text: string;
  status: string;
  error_detail: string | null;
  created_at: string;
  updated_at: string;
}

interface ChunkRow {
  source_id: string;
  chunk_index: number;
  text: string;
  token_count: number;
  embedding_json: string | null;
  embedding_model: string | null;
}

export interface ChunkInput {
  text: string;
  embedding?: number[] | null;
  embeddingModel?: string | null;
}

const SOURCE_COLUMNS = 'seq, id, origin, modality, raw_metadata_json, extracted_text, status, error_detail, created_at, updated_at';

function parseModality(value: string): Modality {
  const modality = MODALITIES.find((m) => m === value);
  if (!modality) throw new InvalidRecordError(`Unknown modality in store: ${value}`);
  return modality;
}

function parseMetadata(json: string): RawMetadata {
  try {
    const parsed: unknown = JSON.parse(json);
    return parsed && typeof parsed === 'object' && !Array.isArray(parsed) ? { ...parsed } : {};
  } catch {
    return {};
  }
}

function parseEmbedding(json: string | null): number[] | null {
  if (!json) return null;
  try {
    const parsed: unknown = JSON.parse(json);
    return Array.isArray(parsed) && parsed.every((v) => typeof v === 'number') ? parsed : null;
  } catch {
    return null;
  }
}

function rowToRecord(row: SourceRow): SourceRecord {
  const base = {
    id: row.id,
    origin: row.origin,
    modality: parseModality(row.modality),
    raw_metadata: parseMetadata(row.raw_metadata_json),
    created_at: row.created_at,
    updated_at: row.updated_at
  };

  switch (row.status) {
    case 'processed':
      return { ...base, status: 'processed', extracted_text: row.extracted_text };
    case 'failed':
      return { ...base, status: 'failed', extracted_text: '', error_detail: row.error_detail || 'Unknown error' };
    case 'pending':
      return { ...base, status: 'pending', extracted_text: '' };
    default:
      throw new InvalidRecordError(`Unknown status in store: ${row.status}`);
  }
}

function assertValid(record: SourceRecord): void {
  const { id } = record;
  if (!id.trim()) throw new InvalidRecordError('Source record id must not be empty');
  if (!MODALITIES.includes(record.modality)) throw new InvalidRecordError(`Unknown modality: ${record.modality}`);
  if (typeof record.extracted_text !== 'string') {
    throw new InvalidRecordError(`Source ${id}: extracted_text must be a string`);
  }
  if (record.status === 'failed') {
    if (!record.error_detail?.trim()) throw new InvalidRecordError(`Source ${id}: failed records need an error_detail`);
    if (record.extracted_text !== '') throw new InvalidRecordError(`Source ${id}: failed records carry no extracted_text`);
  } else if (record.error_detail !== undefined) {
    throw new InvalidRecordError(`Source ${id}: error_detail is only allowed on failed records`);
  }
}

/**
 * Inserts or replaces a source and its chunk index in one transaction.
 * `created_at` and the insertion order of an existing id are kept.
 * Processed records without explicit chunks are chunked here, without embeddings.
 */
export function upsertSource(ctx: DBContext, record: SourceRecord, chunks?: ChunkInput[]): SourceRecord {
  assertValid(record);

  const chunkRows: ChunkInput[] =
    record.status !== 'processed' ? [] : chunks ?? chunkText(record.extracted_text).map((text) => ({ text }));

  const write = ctx.db.transaction(() => {
    ctx.db
      .prepare(
        `INSERT INTO sources (id, origin, modality, raw_metadata_json, extracted_text, status, error_detail, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           origin = excluded.origin,
           modality = excluded.modality,
           raw_metadata_json = excluded.raw_metadata_json,
           extracted_text = excluded.extracted_text,
           status = excluded.status,
           error_detail = excluded.error_detail,
           updated_at = excluded.updated_at`
      )
      .run(
        record.id,
        record.origin,
        record.modality,
        JSON.stringify(record.raw_metadata ?? {}),
        record.extracted_text,
        record.status,
        record.error_detail ?? null,
        record.created_at,
        record.updated_at
      );

    ctx.db.prepare('DELETE FROM chunks WHERE source_id = ?').run(record.id);

    const insertChunk = ctx.db.prepare(
      'INSERT INTO chunks (source_id, chunk_index, text, token_count, embedding_json, embedding_model) VALUES (?, ?, ?, ?, ?, ?)'
    );
    chunkRows.forEach((chunk, index) => {
      insertChunk.run(
        record.id,
        index,
        chunk.text,
        simpleTokenCount(chunk.text),
        chunk.embedding ? JSON.stringify(chunk.embedding) : null,
        chunk.embedding ? (chunk.embeddingModel ?? null) : null
      );
    });
  });

  write();
  return getSource(ctx, record.id);
}

export function findSource(ctx: DBContext, id: string): SourceRecord | undefined {
  const row = ctx.db.prepare<[string], SourceRow>(`SELECT ${SOURCE_COLUMNS} FROM sources WHERE id = ?`).get(id);
  return row ? rowToRecord(row) : undefined;
}

export function getSource(ctx: DBContext, id: string): SourceRecord {
  const record = findSource(ctx, id);
  if (!record) throw new NotFoundError(id);
  return record;
}

/**
 * Lazily walks every source in insertion order. Each call starts a fresh
 * cursor; the connection cannot write until the iteration finishes.
 */
export function* listSources(ctx: DBContext): Generator<SourceRecord, void, undefined> {
  const stmt = ctx.db.prepare<[], SourceRow>(`SELECT ${SOURCE_COLUMNS} FROM sources ORDER BY seq`);
  for (const row of stmt.iterate()) {
    yield rowToRecord(row);
  }
}

export function listProcessedSources(ctx: DBContext): SourceRecord[] {
  return ctx.db
    .prepare<[], SourceRow>(`SELECT ${SOURCE_COLUMNS} FROM sources WHERE status = 'processed' ORDER BY seq`)
    .all()
    .map(rowToRecord);
}

/**
 * Processed sources whose text contains at least one of the terms, in insertion order.
 * Case folding happens here rather than in SQL: SQLite's lower() only folds ASCII.
 */
export function searchSources(ctx: DBContext, terms: string[]): SourceRecord[] {
  const needles = Array.from(new Set(terms.map((t) => t.trim().toLowerCase()).filter(Boolean)));
  if (!needles.length) return [];

  const rows = ctx.db
    .prepare<[], SourceRow>(`SELECT ${SOURCE_COLUMNS} FROM sources WHERE status = 'processed' ORDER BY seq`)
    .all();
  return rows
    .filter((row) => {
      const haystack = row.extracted_text.toLowerCase();
      return needles.some((needle) => haystack.includes(needle));
    })
    .map(rowToRecord);
}

export function listChunks(ctx: DBContext, sourceId: string): ChunkRecord[] {
  return ctx.db
    .prepare<[string], ChunkRow>(
      `SELECT source_id, chunk_index, text, token_count, embedding_json, embedding_model
       FROM chunks WHERE source_id = ? ORDER BY chunk_index`
    )
    .all(sourceId)
    .map((row) => ({
      source_id: row.source_id,
      chunk_index: row.chunk_index,
      text: row.text,
      token_count: row.token_count,
      embedding: parseEmbedding(row.embedding_json),
      embedding_model: row.embedding_model
    }));
}

export function countSources(ctx: DBContext): { total: number; processed: number; failed: number; pending: number } {
  const row = ctx.db
    .prepare<[], { total: number; processed: number | null; failed: number | null; pending: number | null }>(
      `SELECT COUNT(*) AS total,
              SUM(CASE WHEN status = 'processed' THEN 1 ELSE 0 END) AS processed,
              SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) AS failed,
              SUM(CASE WHEN status = 'pending' THEN 1 ELSE 0 END) AS pending
       FROM sources`
    )
    .get();
  return {
    total: row?.total ?? 0,
    processed: row?.processed ?? 0,
    failed: row?.failed ?? 0,
    pending: row?.pending ?? 0
  };
}

/** Deletes every source, chunk and saved query. Irreversible. */
export function clearStore(ctx: DBContext): { sourcesDeleted: number } {
  const clear = ctx.db.transaction(() => {
    ctx.db.prepare('DELETE FROM chunks').run();
    const result = ctx.db.prepare('DELETE FROM sources').run();
    ctx.db.prepare('DELETE FROM queries').run();
    return result.changes;
  });
  return { sourcesDeleted: clear() };
}
