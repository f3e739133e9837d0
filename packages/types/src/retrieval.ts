import type { ChunkSource, SparseVector } from "./chunk.js";

export type TargetModel = "claude" | "gpt" | "gemini" | "generic";

export interface SearchRequest {
  query: string;
  knowledgeBase: string;
  topK?: number;
  useRerank?: boolean;
  deduplicate?: boolean;
  targetModel?: TargetModel;
  /** Precomputed query vectors; computed from `query` when absent. */
  queryVector?: number[];
  sparseVector?: SparseVector;
}

export interface SearchHit {
  chunkId: string;
  text: string;
  source: ChunkSource;
  denseScore: number | null;
  sparseScore: number | null;
  rrfScore: number;
  rrfRank: number;
  rerankScore: number | null;
  /** 1-based final position. */
  rank: number;
}

export interface SourceSummaryEntry {
  sourceFile: string;
  chunkCount: number;
}

export interface SearchDiagnostics {
  denseCandidates: number;
  sparseCandidates: number;
  fusedCandidates: number;
  reranked: boolean;
  duplicatesRemoved: number;
  warnings: string[];
  timings: {
    totalMs: number;
    rerankMs?: number;
  };
}

export interface FusedResultSet {
  query: string;
  knowledgeBase: string;
  hits: SearchHit[];
  formattedContext: string;
  sourceSummary: SourceSummaryEntry[];
  diagnostics: SearchDiagnostics;
}

export interface VectorMatch {
  chunkId: string;
  score: number;
}

export interface ConversationTurn {
  role: "user" | "assistant";
  content: string;
}

export interface AnswerRequest {
  query: string;
  knowledgeBase?: string;
  history?: ConversationTurn[];
  topK?: number;
  useRerank?: boolean;
  targetModel?: TargetModel;
}

export interface AnswerResult {
  answer: string;
  knowledgeBase: string | null;
  routed: boolean;
  sources: SearchHit[];
  model: string;
  tokens: {
    input: number;
    output: number;
  };
}
