import type { VectorMatch } from "@stratarag/types";

export const DEFAULT_RRF_K = 60;

export interface FusedCandidate {
  chunkId: string;
  rrfScore: number;
  /** 1-based position after fusion. */
  rrfRank: number;
  denseScore: number | null;
  sparseScore: number | null;
}

interface Accumulator {
  chunkId: string;
  rrfScore: number;
  denseScore: number | null;
  sparseScore: number | null;
  firstSeen: number;
}

/**
 * Reciprocal Rank Fusion of the dense and sparse lists:
 * `score = Σ 1 / (k + rank)` with 1-based ranks. Only positions count, never
 * the raw scores. Ties keep first-appearance order, dense list first.
 */
export function reciprocalRankFusion(
  dense: readonly VectorMatch[],
  sparse: readonly VectorMatch[],
  k: number = DEFAULT_RRF_K,
): FusedCandidate[] {
  const byId = new Map<string, Accumulator>();

  const accumulate = (matches: readonly VectorMatch[], channel: "dense" | "sparse"): void => {
    const seen = new Set<string>();
    let rank = 0;
    for (const match of matches) {
      // A repeated id keeps its best rank only
      if (seen.has(match.chunkId)) continue;
      seen.add(match.chunkId);
      rank++;

      let entry = byId.get(match.chunkId);
      if (!entry) {
        entry = {
          chunkId: match.chunkId,
          rrfScore: 0,
          denseScore: null,
          sparseScore: null,
          firstSeen: byId.size,
        };
        byId.set(match.chunkId, entry);
      }
      entry.rrfScore += 1 / (k + rank);
      if (channel === "dense") entry.denseScore = match.score;
      else entry.sparseScore = match.score;
    }
  };

  accumulate(dense, "dense");
  accumulate(sparse, "sparse");

  return [...byId.values()]
    .sort((a, b) => b.rrfScore - a.rrfScore || a.firstSeen - b.firstSeen)
    .map((entry, index) => ({
      chunkId: entry.chunkId,
      rrfScore: entry.rrfScore,
      rrfRank: index + 1,
      denseScore: entry.denseScore,
      sparseScore: entry.sparseScore,
    }));
}
