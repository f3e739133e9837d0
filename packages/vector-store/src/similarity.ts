import { ValidationError } from "@stratarag/errors";
import type { SparseVector } from "@stratarag/types";

/** Cosine similarity in [-1, 1]; 0 when either vector has zero norm. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new ValidationError(
      `Vector dimension mismatch: ${String(a.length)} vs ${String(b.length)}`,
    );
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function sparseToMap(vector: SparseVector): Map<number, number> {
  const map = new Map<number, number>();
  vector.indices.forEach((index, i) => {
    map.set(index, (map.get(index) ?? 0) + (vector.values[i] ?? 0));
  });
  return map;
}
