/**
 * Scores (query, passage) pairs. Scores come back aligned with `texts`;
 * higher means more relevant.
 */
export interface IRerankScorer {
  readonly name: string;
  score(query: string, texts: readonly string[], signal?: AbortSignal): Promise<number[]>;
}
