import type { ChunkResult, ChunkingConfig } from "@stratarag/types";
import type { IChunker } from "./chunker.interface.js";

/**
 * Chunk each page separately, stamping the 1-based page number and numbering
 * chunks across the whole document. Chunks before the first header on a page
 * inherit the section the previous page ended in.
 */
export function chunkPages(
  chunker: IChunker,
  pages: readonly string[],
  config: ChunkingConfig,
): ChunkResult[] {
  const results: ChunkResult[] = [];
  let section: string | undefined;

  pages.forEach((page, pageIndex) => {
    for (const chunk of chunker.chunk(page, config)) {
      section = chunk.metadata.section ?? section;
      results.push({
        ...chunk,
        index: results.length,
        metadata: {
          ...chunk.metadata,
          page: pageIndex + 1,
          ...(section !== undefined ? { section } : {}),
        },
      });
    }
  });

  return results;
}
