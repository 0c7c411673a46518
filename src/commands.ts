import { probeCapabilities } from './capabilities.js';
import type { KBConfig, KBSettings } from './config.js';
import { closeDB, initDB, type DBContext } from './db/client.js';
import { listQueries } from './db/queries.js';
import { getSettings, updateSettings } from './db/settings.js';
import { clearStore, listSources } from './db/sources.js';
import { ingestBatch, type BatchSummary } from './ingest/pipeline.js';
import { healthStatus, recentIngestLogs, type HealthReport, type IngestLogEntry } from './observability.js';
import { createEmbedder, type Embedder } from './retrieval/embeddings.js';
import { OpenAIChatSynthesizer } from './retrieval/openai-synthesizer.js';
import { answerQuestion } from './retrieval/search.js';
import { ExtractiveSynthesizer, type AnswerSynthesizer } from './retrieval/synthesize.js';
import type { IngestionResult, QueryAnswer, QueryHistoryEntry, SourceRecord } from './types.js';
import { runCommand, type CommandRunner } from './utils/command.js';

export interface Runtime {
  ctx: DBContext;
  config: KBConfig;
  /** Settings from the environment, before stored overrides. */
  defaults: KBSettings;
  synthesizer: AnswerSynthesizer;
  embed: Embedder;
  run: CommandRunner;
  sleep?: (ms: number) => Promise<void>;
}

export interface RuntimeOptions {
  /** Skip the toolchain probe and use `config.capabilities` as given. */
  skipProbe?: boolean;
  run?: CommandRunner;
  synthesizer?: AnswerSynthesizer;
  embed?: Embedder;
  sleep?: (ms: number) => Promise<void>;
}

export function defaultSynthesizer(config: KBConfig): AnswerSynthesizer {
  return config.synthesizer.apiKey ? new OpenAIChatSynthesizer(config.synthesizer) : new ExtractiveSynthesizer();
}

export async function createRuntime(config: KBConfig, options: RuntimeOptions = {}): Promise<Runtime> {
  const run = options.run ?? runCommand;
  const capabilities = options.skipProbe ? config.capabilities : await probeCapabilities(config.tools, run);
  const ctx = initDB(config.dbPath);

  const probed: KBConfig = { ...config, capabilities };
  return {
    ctx,
    config: { ...probed, settings: getSettings(ctx, config.settings) },
    defaults: config.settings,
    synthesizer: options.synthesizer ?? defaultSynthesizer(probed),
    embed:
      options.embed ??
      createEmbedder({ apiKey: config.synthesizer.apiKey, model: config.embeddingModel, baseURL: config.synthesizer.baseURL }),
    run,
    sleep: options.sleep
  };
}

export function closeRuntime(runtime: Runtime): void {
  closeDB(runtime.ctx);
}

export async function processInputs(
  runtime: Runtime,
  inputs: string[],
  options: { signal?: AbortSignal; onResult?: (result: IngestionResult) => void } = {}
): Promise<BatchSummary> {
  return ingestBatch(runtime.ctx, runtime.config, inputs, {
    ...options,
    run: runtime.run,
    embed: runtime.embed
  });
}

export async function query(runtime: Runtime, question: string): Promise<QueryAnswer> {
  const { synthesizer: synth } = runtime.config;
  return answerQuestion(runtime.ctx, question, {
    settings: runtime.config.settings,
    synthesizer: runtime.synthesizer,
    synthesis: { retries: synth.retries, backoffMs: synth.backoffMs, timeoutMs: synth.timeoutMs },
    embed: runtime.embed,
    sleep: runtime.sleep
  });
}

export function list(runtime: Runtime): Generator<SourceRecord, void, undefined> {
  return listSources(runtime.ctx);
}

export type ClearResult = { cleared: true; sourcesDeleted: number } | { cleared: false; message: string };

export function clear(runtime: Runtime, confirm: boolean): ClearResult {
  if (!confirm) {
    return { cleared: false, message: 'Refusing to clear the store without confirmation. Re-run with --confirm.' };
  }
  return { cleared: true, ...clearStore(runtime.ctx) };
}

export function status(runtime: Runtime): {
  health: HealthReport;
  settings: KBSettings;
  capabilities: KBConfig['capabilities'];
  synthesizer: string;
  recentProblems: IngestLogEntry[];
} {
  return {
    health: healthStatus(runtime.ctx),
    settings: runtime.config.settings,
    capabilities: runtime.config.capabilities,
    synthesizer: runtime.synthesizer.name,
    recentProblems: recentIngestLogs(runtime.ctx, { limit: 10, minLevel: 'warn' })
  };
}

export function history(runtime: Runtime, limit = 20): QueryHistoryEntry[] {
  return listQueries(runtime.ctx, limit);
}

export function configure(runtime: Runtime, patch: Partial<KBSettings>): KBSettings {
  const next = updateSettings(runtime.ctx, runtime.defaults, patch);
  runtime.config = { ...runtime.config, settings: next };
  return next;
}
