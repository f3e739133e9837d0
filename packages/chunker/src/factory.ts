import type { IChunker, ChunkStrategy } from "./chunker.interface.js";
import { MarkdownChunker } from "./markdown-chunker.js";
import { RecursiveChunker } from "./recursive-chunker.js";

export function createChunker(strategy: ChunkStrategy = "markdown"): IChunker {
  switch (strategy) {
    case "markdown":
      return new MarkdownChunker();
    case "recursive":
      return new RecursiveChunker();
    default:
      throw new Error(`Unknown chunking strategy: ${String(strategy)}`);
  }
}
