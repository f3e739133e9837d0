export const DEFAULT_DEDUP_THRESHOLD = 0.85;
const SHINGLE_SIZE = 3;

export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

/** Word n-grams of the normalized text; short texts form a single shingle. */
export function shingles(text: string, size: number = SHINGLE_SIZE): Set<string> {
  const words = normalizeText(text).split(" ").filter((w) => w.length > 0);
  if (words.length <= size) {
    return new Set(words.length > 0 ? [words.join(" ")] : []);
  }
  const result = new Set<string>();
  for (let i = 0; i + size <= words.length; i++) {
    result.add(words.slice(i, i + size).join(" "));
  }
  return result;
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 1;
  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

export interface DedupResult<T> {
  kept: T[];
  removed: number;
}

/**
 * Walk hits in order and drop any whose text matches a kept hit, exactly
 * after normalization or by shingle Jaccard at or above `threshold`.
 * The first (highest ranked) instance survives.
 */
export function deduplicateHits<T extends { text: string }>(
  hits: readonly T[],
  threshold: number = DEFAULT_DEDUP_THRESHOLD,
): DedupResult<T> {
  const kept: Array<{ hit: T; normalized: string; shingles: Set<string> }> = [];
  let removed = 0;

  for (const hit of hits) {
    const normalized = normalizeText(hit.text);
    const hitShingles = shingles(hit.text);
    const duplicate = kept.some(
      (k) => k.normalized === normalized || jaccard(k.shingles, hitShingles) >= threshold,
    );
    if (duplicate) {
      removed++;
      continue;
    }
    kept.push({ hit, normalized, shingles: hitShingles });
  }

  return { kept: kept.map((k) => k.hit), removed };
}
