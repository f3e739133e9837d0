export type { IChunker, ChunkStrategy } from "./chunker.interface.js";
export { RecursiveChunker, DEFAULT_SEPARATORS, estimateTokens } from "./recursive-chunker.js";
export { MarkdownChunker, splitSections } from "./markdown-chunker.js";
export { chunkPages } from "./pages.js";
export { createChunker } from "./factory.js";
