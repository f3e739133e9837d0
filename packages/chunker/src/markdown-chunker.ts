import type { ChunkResult, ChunkingConfig } from "@stratarag/types";
import type { IChunker } from "./chunker.interface.js";
import { RecursiveChunker } from "./recursive-chunker.js";

const HEADER_REGEX = /^(#{1,6})[ \t]+(.+?)[ \t#]*$/gm;

interface Section {
  title?: string;
  start: number;
  end: number;
}

export function splitSections(content: string): Section[] {
  const sections: Section[] = [];
  let start = 0;
  let title: string | undefined;

  for (const match of content.matchAll(HEADER_REGEX)) {
    const index = match.index ?? 0;
    if (index > start) {
      sections.push({ title, start, end: index });
    }
    start = index;
    title = match[2]?.trim();
  }
  if (start < content.length) {
    sections.push({ title, start, end: content.length });
  }
  return sections;
}

/**
 * Splits at markdown headers first so no chunk spans two sections, then
 * falls back to recursive paragraph / line / sentence / word splitting
 * inside sections larger than the chunk size.
 */
export class MarkdownChunker implements IChunker {
  readonly strategy = "markdown";
  private inner: RecursiveChunker;

  constructor(separators?: string[]) {
    this.inner = new RecursiveChunker(separators);
  }

  chunk(content: string, config: ChunkingConfig): ChunkResult[] {
    const results: ChunkResult[] = [];
    for (const section of splitSections(content)) {
      for (const chunk of this.inner.chunkRange(content, section.start, section.end, config)) {
        results.push({
          ...chunk,
          index: results.length,
          metadata: {
            ...chunk.metadata,
            ...(section.title !== undefined ? { section: section.title } : {}),
          },
        });
      }
    }
    return results;
  }
}
