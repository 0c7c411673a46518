import { DBContext } from './client.js';
import type { QueryHistoryEntry, QueryStatus } from '../types.js';

interface QueryRow {
  id: number;
  question: string;
  answer: string | null;
  source_ids_json: string;
  status: string;
  created_at: string;
}

function toStatus(value: string): QueryStatus {
  return value === 'answered' || value === 'no_context' ? value : 'failed';
}

function parseIds(json: string): string[] {
  try {
    const parsed: unknown = JSON.parse(json);
    return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
  } catch {
    return [];
  }
}

export function recordQuery(
  ctx: DBContext,
  entry: { question: string; answer: string | null; sourceIds: string[]; status: QueryStatus; durationMs?: number }
): number {
  const result = ctx.db
    .prepare('INSERT INTO queries (question, answer, source_ids_json, status, duration_ms) VALUES (?, ?, ?, ?, ?)')
    .run(entry.question, entry.answer, JSON.stringify(entry.sourceIds), entry.status, entry.durationMs ?? null);
  return Number(result.lastInsertRowid);
}

/** Most recent first. */
export function listQueries(ctx: DBContext, limit = 20): QueryHistoryEntry[] {
  return ctx.db
    .prepare<[number], QueryRow>(
      'SELECT id, question, answer, source_ids_json, status, created_at FROM queries ORDER BY id DESC LIMIT ?'
    )
    .all(limit)
    .map((row) => ({
      id: row.id,
      question: row.question,
      answer: row.answer,
      source_ids: parseIds(row.source_ids_json),
      status: toStatus(row.status),
      created_at: row.created_at
    }));
}
