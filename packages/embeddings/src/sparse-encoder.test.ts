import { describe, expect, it } from "vitest";
import { Bm25SparseEncoder, hashToken, tokenize } from "./sparse-encoder.js";

describe("tokenize", () => {
  it("lowercases, splits on non-word characters and drops stopwords", () => {
    expect(tokenize("The Leave-Policy, for 2024!")).toEqual(["leave", "policy", "2024"]);
  });

  it("keeps non-Latin letters", () => {
    expect(tokenize("Über café")).toEqual(["über", "café"]);
  });
});

describe("hashToken", () => {
  it("is 32-bit FNV-1a", () => {
    expect(hashToken("a")).toBe(3826002220);
    expect(hashToken("cat")).toBe(108289031);
  });
});

describe("Bm25SparseEncoder", () => {
  const encoder = new Bm25SparseEncoder({ avgDocLength: 3 });

  it("gives query terms unit weight, sorted by index", () => {
    expect(encoder.encodeQuery("the hat and the cat cat")).toEqual({
      indices: [108289031, 4072609730],
      values: [1, 1],
    });
  });

  it("saturates document term frequency", () => {
    const vector = encoder.encodeDocument("cat cat hat");

    expect(vector.indices).toEqual([108289031, 4072609730]);
    expect(vector.values[0]).toBeCloseTo(1.375, 10);
    expect(vector.values[1]).toBeCloseTo(1.0, 10);
  });

  it("returns an empty vector for text with no terms", () => {
    expect(encoder.encodeDocument("the of and")).toEqual({ indices: [], values: [] });
  });
});
