import type { EmbeddingResult, SparseVector } from "@stratarag/types";

export type EmbeddingInputType = "query" | "document";

export interface EmbedOptions {
  /** Defaults to "query" for `embed` and "document" for `batchEmbed`. */
  inputType?: EmbeddingInputType;
  signal?: AbortSignal;
}

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult>;
  batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}

/** Local lexical encoder producing sparse term-weight vectors. */
export interface ISparseEncoder {
  encodeDocument(text: string): SparseVector;
  encodeQuery(text: string): SparseVector;
}
