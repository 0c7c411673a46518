import { describe, it, expect } from 'vitest';
import { cosineSimilarity, createEmbedder, localEmbedding } from '../src/retrieval/embeddings.js';
import { finalRank, getRankingWeights, lexicalScore } from '../src/retrieval/ranking.js';

describe('ranking', () => {
  it('uses default hybrid weights', () => {
    expect(getRankingWeights({})).toEqual({ lexical: 0.6, semantic: 0.4 });
  });

  it('supports configurable ranking weights', () => {
    const weights = getRankingWeights({ KB_RANKING_WEIGHTS_JSON: JSON.stringify({ lexical: 1, semantic: 3 }) });
    expect(weights.lexical).toBeCloseTo(0.25, 6);
    expect(weights.semantic).toBeCloseTo(0.75, 6);
  });

  it('falls back to defaults for malformed or zero weights', () => {
    expect(getRankingWeights({ KB_RANKING_WEIGHTS_JSON: 'not json' })).toEqual({ lexical: 0.6, semantic: 0.4 });
    expect(getRankingWeights({ KB_RANKING_WEIGHTS_JSON: JSON.stringify({ lexical: 0, semantic: 0 }) })).toEqual({
      lexical: 0.6,
      semantic: 0.4
    });
  });

  it('scores the share of query terms present', () => {
    const tokens = new Set(['the', 'capital', 'of', 'france', 'is', 'paris']);
    expect(lexicalScore(['capital', 'france'], tokens)).toBe(1);
    expect(lexicalScore(['capital', 'germany'], tokens)).toBe(0.5);
    expect(lexicalScore([], tokens)).toBe(0);
  });

  it('combines lexical and semantic scores, ignoring negative similarity', () => {
    const weights = { lexical: 0.5, semantic: 0.5 };
    expect(finalRank(1, 0.5, weights)).toBeCloseTo(0.75, 6);
    expect(finalRank(0.5, -0.9, weights)).toBeCloseTo(0.25, 6);
  });
});

describe('embeddings', () => {
  it('produces unit vectors that match identical text', () => {
    const a = localEmbedding('river boats on the Seine');
    const b = localEmbedding('River boats on the Seine!');
    expect(a).toHaveLength(384);
    expect(cosineSimilarity(a, b)).toBeCloseTo(1, 6);
  });

  it('rates related text above unrelated text', () => {
    const query = localEmbedding('capital of France');
    const related = localEmbedding('Paris is the capital of France');
    const unrelated = localEmbedding('photosynthesis in green plants');
    expect(cosineSimilarity(query, related)).toBeGreaterThan(cosineSimilarity(query, unrelated));
  });

  it('returns zero similarity for mismatched or empty vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
  });

  it('embeds locally without an API key', async () => {
    const embed = createEmbedder({ apiKey: null, model: 'unused' });
    const { model, vectors } = await embed(['hello world']);
    expect(model).toBe('local-hash-384');
    expect(vectors).toEqual([localEmbedding('hello world')]);
  });
});
