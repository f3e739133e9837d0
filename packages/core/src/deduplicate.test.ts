import { describe, it, expect } from "vitest";
import { deduplicateHits, jaccard, normalizeText, shingles } from "./deduplicate.js";

const base = "the quick brown fox jumps over the lazy dog today in the park";

describe("normalizeText", () => {
  it("lowercases and collapses punctuation and whitespace", () => {
    expect(normalizeText("  Hello,   World!\nAgain ")).toBe("hello world again");
  });
});

describe("shingles", () => {
  it("builds three-word shingles", () => {
    expect([...shingles("one two three four")]).toEqual(["one two three", "two three four"]);
  });

  it("keeps a short text as one shingle", () => {
    expect([...shingles("Hi there")]).toEqual(["hi there"]);
    expect(shingles("  ").size).toBe(0);
  });
});

describe("jaccard", () => {
  it("treats two empty sets as identical", () => {
    expect(jaccard(new Set(), new Set())).toBe(1);
  });

  it("divides intersection by union", () => {
    expect(jaccard(new Set(["a", "b"]), new Set(["b", "c"]))).toBeCloseTo(1 / 3, 12);
  });
});

describe("deduplicateHits", () => {
  const hit = (id: string, text: string) => ({ id, text });

  it("drops texts equal after normalization, keeping the first", () => {
    const { kept, removed } = deduplicateHits([hit("1", "Refund Policy: 30 days."), hit("2", "refund policy 30 days")]);
    expect(kept.map((h) => h.id)).toEqual(["1"]);
    expect(removed).toBe(1);
  });

  it("drops near duplicates at or above the threshold", () => {
    // 11 shared shingles out of 12
    const { kept } = deduplicateHits([hit("1", base), hit("2", `${base} again`)]);
    expect(kept.map((h) => h.id)).toEqual(["1"]);
  });

  it("keeps texts below the threshold", () => {
    // 10 shared shingles out of 12
    const { kept } = deduplicateHits([hit("1", base), hit("2", base.replace(/park$/, "garden"))]);
    expect(kept.map((h) => h.id)).toEqual(["1", "2"]);
  });

  it("is idempotent", () => {
    const hits = [hit("1", base), hit("2", "something else entirely"), hit("3", `${base} again`), hit("4", "Something else, entirely!")];
    const once = deduplicateHits(hits).kept;
    const twice = deduplicateHits(once);
    expect(once.map((h) => h.id)).toEqual(["1", "2"]);
    expect(twice.kept).toEqual(once);
    expect(twice.removed).toBe(0);
  });
});
