import { describe, it, expect } from "vitest";
import type { ChunkingConfig } from "@stratarag/types";
import { RecursiveChunker } from "./recursive-chunker.js";
import { MarkdownChunker, splitSections } from "./markdown-chunker.js";
import { chunkPages } from "./pages.js";
import { createChunker } from "./factory.js";

const SAMPLE_TEXT = `This is the first paragraph of the document. It contains some important information about the topic at hand.

This is the second paragraph. It elaborates on the points made in the first paragraph with additional details and examples.

This is the third paragraph. It provides a conclusion and summarizes the key points discussed in the previous sections.`;

const config: ChunkingConfig = { chunkSize: 200, overlap: 40 };

describe("RecursiveChunker", () => {
  const chunker = new RecursiveChunker();

  it("has strategy 'recursive'", () => {
    expect(chunker.strategy).toBe("recursive");
  });

  it("keeps short text in one chunk", () => {
    const results = chunker.chunk("  A single paragraph.  ", config);
    expect(results).toHaveLength(1);
    expect(results[0]?.content).toBe("A single paragraph.");
    expect(results[0]?.metadata).toEqual({ startChar: 2, endChar: 21 });
  });

  it("handles empty content", () => {
    expect(chunker.chunk("", config)).toHaveLength(0);
    expect(chunker.chunk("   \n\n  ", config)).toHaveLength(0);
  });

  it("merges words into overlapping windows", () => {
    const results = chunker.chunk("aaaa bbbb cccc dddd", { chunkSize: 10, overlap: 5 });

    expect(results.map((r) => r.content)).toEqual(["aaaa bbbb", "bbbb cccc", "cccc dddd"]);
    expect(results.map((r) => r.metadata.startChar)).toEqual([0, 5, 10]);
    expect(results.map((r) => r.index)).toEqual([0, 1, 2]);
  });

  it("does not overlap when overlap is 0", () => {
    const results = chunker.chunk("aaaa bbbb cccc dddd", { chunkSize: 10, overlap: 0 });
    expect(results.map((r) => r.content)).toEqual(["aaaa bbbb", "cccc dddd"]);
  });

  it("hard-cuts text without separators", () => {
    const results = chunker.chunk("abcdefghij", { chunkSize: 4, overlap: 0 });
    expect(results.map((r) => r.content)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("never exceeds the chunk size and offsets point at the content", () => {
    const results = chunker.chunk(SAMPLE_TEXT, config);
    expect(results.length).toBeGreaterThan(1);
    for (const chunk of results) {
      expect(chunk.content.length).toBeLessThanOrEqual(200);
      expect(SAMPLE_TEXT.slice(chunk.metadata.startChar, chunk.metadata.endChar)).toBe(
        chunk.content,
      );
      expect(chunk.tokenCount).toBe(Math.ceil(chunk.content.length / 4));
    }
  });
});

describe("MarkdownChunker", () => {
  const chunker = new MarkdownChunker();
  const doc = "Intro text.\n# Leave\nTake leave.\n## Sick\nSee doctor.";

  it("splits sections at headers", () => {
    expect(splitSections(doc)).toEqual([
      { title: undefined, start: 0, end: 12 },
      { title: "Leave", start: 12, end: 32 },
      { title: "Sick", start: 32, end: 51 },
    ]);
  });

  it("labels chunks with their section", () => {
    const results = chunker.chunk(doc, { chunkSize: 1000, overlap: 200 });

    expect(results.map((r) => r.content)).toEqual([
      "Intro text.",
      "# Leave\nTake leave.",
      "## Sick\nSee doctor.",
    ]);
    expect(results.map((r) => r.metadata.section)).toEqual([undefined, "Leave", "Sick"]);
    expect(results[1]?.metadata).toMatchObject({ startChar: 12, endChar: 31 });
  });

  it("strips trailing hashes from header titles", () => {
    expect(splitSections("## Benefits ##\nbody")[0]?.title).toBe("Benefits");
  });
});

describe("chunkPages", () => {
  it("numbers pages and chunks across the document and carries sections over", () => {
    const results = chunkPages(new MarkdownChunker(), ["# A\nx", "y more", "# B\nz"], {
      chunkSize: 1000,
      overlap: 0,
    });

    expect(
      results.map((r) => [r.index, r.metadata.page, r.metadata.section, r.content]),
    ).toEqual([
      [0, 1, "A", "# A\nx"],
      [1, 2, "A", "y more"],
      [2, 3, "B", "# B\nz"],
    ]);
  });

  it("skips blank pages", () => {
    const results = chunkPages(new RecursiveChunker(), ["one", "  ", "three"], config);
    expect(results.map((r) => r.metadata.page)).toEqual([1, 3]);
  });
});

describe("createChunker", () => {
  it("defaults to markdown", () => {
    expect(createChunker().strategy).toBe("markdown");
    expect(createChunker("recursive").strategy).toBe("recursive");
  });
});
