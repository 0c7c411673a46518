import { DBContext } from './db/client.js';

export type LogLevel = 'info' | 'warn' | 'error';

export function logIngestEvent(
  ctx: DBContext,
  params: {
    jobId?: number;
    sourceOrigin?: string;
    sourceId?: string;
    level?: LogLevel;
    eventType: string;
    event?: Record<string, unknown>;
  }
): void {
  ctx.db
    .prepare(
      `INSERT INTO ingest_logs (job_id, source_origin, source_id, level, event_type, event_json)
       VALUES (?, ?, ?, ?, ?, ?)`
    )
    .run(
      params.jobId ?? null,
      params.sourceOrigin ?? null,
      params.sourceId ?? null,
      params.level ?? 'info',
      params.eventType,
      JSON.stringify(params.event ?? {})
    );
}

export function recordJobMetric(
  ctx: DBContext,
  params: { jobId?: number; metricName: string; metricValue: number; labels?: Record<string, unknown> }
): void {
  ctx.db
    .prepare('INSERT INTO job_metrics (job_id, metric_name, metric_value, labels_json) VALUES (?, ?, ?, ?)')
    .run(params.jobId ?? null, params.metricName, params.metricValue, JSON.stringify(params.labels ?? {}));
}

export interface IngestLogEntry {
  id: number;
  jobId: number | null;
  sourceOrigin: string | null;
  sourceId: string | null;
  level: LogLevel;
  eventType: string;
  event: Record<string, unknown>;
  createdAt: string;
}

interface IngestLogRow {
  id: number;
  job_id: number | null;
  source_origin: string | null;
  source_id: string | null;
  level: string;
  event_type: string;
  event_json: string | null;
  created_at: string;
}

function toLevel(value: string): LogLevel {
  return value === 'warn' || value === 'error' ? value : 'info';
}

function parseEvent(json: string | null): Record<string, unknown> {
  if (!json) return {};
  try {
    const parsed: unknown = JSON.parse(json);
    return parsed && typeof parsed === 'object' && !Array.isArray(parsed) ? { ...parsed } : {};
  } catch {
    return {};
  }
}

export function recentIngestLogs(ctx: DBContext, options: { limit?: number; minLevel?: LogLevel } = {}): IngestLogEntry[] {
  const levels: LogLevel[] =
    options.minLevel === 'error' ? ['error'] : options.minLevel === 'warn' ? ['warn', 'error'] : ['info', 'warn', 'error'];
  return ctx.db
    .prepare<(string | number)[], IngestLogRow>(
      `SELECT id, job_id, source_origin, source_id, level, event_type, event_json, created_at
       FROM ingest_logs WHERE level IN (${levels.map(() => '?').join(', ')})
       ORDER BY id DESC LIMIT ?`
    )
    .all(...levels, options.limit ?? 20)
    .map((row) => ({
      id: row.id,
      jobId: row.job_id,
      sourceOrigin: row.source_origin,
      sourceId: row.source_id,
      level: toLevel(row.level),
      eventType: row.event_type,
      event: parseEvent(row.event_json),
      createdAt: row.created_at
    }));
}

export interface HealthReport {
  dbOk: boolean;
  sources: { total: number; processed: number; failed: number; pending: number };
  chunkCount: number;
  queryCount: number;
  jobs: { running: number; done: number; failed: number; cancelled: number };
  recentFailures24h: number;
}

export function healthStatus(ctx: DBContext): HealthReport {
  const dbOk = Boolean(ctx.db.prepare('SELECT 1 as ok').get());
  const sources = ctx.db
    .prepare<[], { total: number; processed: number | null; failed: number | null; pending: number | null }>(
      `SELECT COUNT(*) AS total,
              SUM(CASE WHEN status = 'processed' THEN 1 ELSE 0 END) AS processed,
              SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) AS failed,
              SUM(CASE WHEN status = 'pending' THEN 1 ELSE 0 END) AS pending
       FROM sources`
    )
    .get();
  const chunkCount = ctx.db.prepare<[], { c: number }>('SELECT COUNT(*) as c FROM chunks').get()?.c ?? 0;
  const queryCount = ctx.db.prepare<[], { c: number }>('SELECT COUNT(*) as c FROM queries').get()?.c ?? 0;
  const jobs = ctx.db
    .prepare<[], { running: number | null; done: number | null; failed: number | null; cancelled: number | null }>(
      `SELECT
         SUM(CASE WHEN status = 'running' THEN 1 ELSE 0 END) as running,
         SUM(CASE WHEN status = 'done' THEN 1 ELSE 0 END) as done,
         SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) as failed,
         SUM(CASE WHEN status = 'cancelled' THEN 1 ELSE 0 END) as cancelled
       FROM jobs`
    )
    .get();

  const recentFailures24h =
    ctx.db
      .prepare<[], { c: number }>(
        "SELECT COUNT(*) as c FROM ingest_logs WHERE level = 'error' AND created_at >= datetime('now', '-1 day')"
      )
      .get()?.c ?? 0;

  return {
    dbOk,
    sources: {
      total: sources?.total ?? 0,
      processed: sources?.processed ?? 0,
      failed: sources?.failed ?? 0,
      pending: sources?.pending ?? 0
    },
    chunkCount,
    queryCount,
    jobs: {
      running: jobs?.running ?? 0,
      done: jobs?.done ?? 0,
      failed: jobs?.failed ?? 0,
      cancelled: jobs?.cancelled ?? 0
    },
    recentFailures24h
  };
}
