export interface RankingWeights {
  lexical: number;
  semantic: number;
}

const DEFAULT_WEIGHTS: RankingWeights = { lexical: 0.6, semantic: 0.4 };

function parseJsonObject(value: string | undefined): Record<string, unknown> {
  if (!value) return {};
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed && typeof parsed === 'object' && !Array.isArray(parsed) ? { ...parsed } : {};
  } catch {
    return {};
  }
}

function weightFrom(value: unknown, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

/** Hybrid-mode weights from `KB_RANKING_WEIGHTS_JSON`, normalized to sum to 1. */
export function getRankingWeights(env: Record<string, string | undefined> = process.env): RankingWeights {
  const raw = parseJsonObject(env.KB_RANKING_WEIGHTS_JSON);
  const lexical = weightFrom(raw.lexical, DEFAULT_WEIGHTS.lexical);
  const semantic = weightFrom(raw.semantic, DEFAULT_WEIGHTS.semantic);
  const sum = lexical + semantic;
  if (!sum || !Number.isFinite(sum)) return { ...DEFAULT_WEIGHTS };
  return {
    lexical: lexical / sum,
    semantic: semantic / sum
  };
}

/** Share of the query terms that appear among the chunk's tokens. */
export function lexicalScore(terms: string[], chunkTokens: ReadonlySet<string>): number {
  if (!terms.length) return 0;
  const hits = terms.filter((term) => chunkTokens.has(term)).length;
  return hits / terms.length;
}

export function finalRank(lexical: number, semantic: number, weights: RankingWeights): number {
  // Negative cosine carries no relevance signal.
  return lexical * weights.lexical + Math.max(0, semantic) * weights.semantic;
}
