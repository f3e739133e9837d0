import type { ChunkResult, ChunkingConfig } from "@stratarag/types";

export type ChunkStrategy = "markdown" | "recursive";

export interface IChunker {
  readonly strategy: ChunkStrategy;
  chunk(content: string, config: ChunkingConfig): ChunkResult[];
}
