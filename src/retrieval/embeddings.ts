import OpenAI from 'openai';
import { tokenize } from '../utils/text.js';

const EMBEDDING_DIMS = 384;
export const LOCAL_EMBEDDING_MODEL = `local-hash-${EMBEDDING_DIMS}`;

/** Vectors from one model; only vectors of the same model are comparable. */
export interface EmbeddingBatch {
  model: string;
  vectors: number[][];
}

export type Embedder = (texts: string[]) => Promise<EmbeddingBatch>;

export interface EmbeddingOptions {
  apiKey: string | null;
  model: string;
  baseURL?: string | null;
}

function hashToken(token: string): number {
  let hash = 2166136261;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

function normalize(v: number[]): number[] {
  const norm = Math.sqrt(v.reduce((acc, x) => acc + x * x, 0));
  if (!norm) return v;
  return v.map((x) => x / norm);
}

/** Hashed bag-of-words vector; needs no network and is stable across runs. */
export function localEmbedding(text: string): number[] {
  const vec: number[] = new Array<number>(EMBEDDING_DIMS).fill(0);
  for (const token of tokenize(text)) {
    vec[hashToken(token) % EMBEDDING_DIMS] += 1;
  }
  return normalize(vec);
}

export const localEmbedder: Embedder = async (texts) => ({ model: LOCAL_EMBEDDING_MODEL, vectors: texts.map(localEmbedding) });

/**
 * Remote embeddings when an API key is configured. Any failure of the remote call
 * falls back to local vectors for the whole batch, so one batch never mixes models.
 */
export function createEmbedder(options: EmbeddingOptions): Embedder {
  if (!options.apiKey) return localEmbedder;
  const client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL ?? undefined, maxRetries: 1 });

  return async (texts) => {
    if (!texts.length) return { model: options.model, vectors: [] };
    try {
      const response = await client.embeddings.create({ model: options.model, input: texts });
      const vectors = response.data.map((d) => d.embedding);
      return vectors.length === texts.length ? { model: options.model, vectors } : localEmbedder(texts);
    } catch {
      return localEmbedder(texts);
    }
  };
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom ? dot / denom : 0;
}
