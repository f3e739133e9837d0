import type {
  FusedResultSet,
  SearchConfig,
  SearchDiagnostics,
  SearchHit,
  SearchRequest,
  SparseVector,
  StoredChunk,
  TraceSink,
  VectorMatch,
} from "@stratarag/types";
import {
  AppError,
  CancelledError,
  ExternalServiceError,
  SearchBackendUnavailableError,
  ValidationError,
  withTimeout,
} from "@stratarag/errors";
import type { IEmbeddingProvider, ISparseEncoder } from "@stratarag/embeddings";
import type { IRerankScorer } from "@stratarag/reranker";
import type { IVectorStore } from "@stratarag/vector-store";
import type { Logger } from "@stratarag/logger";
import { noopTraceSink } from "@stratarag/logger";
import { reciprocalRankFusion } from "./rrf.js";
import type { FusedCandidate } from "./rrf.js";
import { deduplicateHits } from "./deduplicate.js";
import { assembleContext, summarizeSources } from "./context-assembler.js";

export const DEFAULT_SEARCH_CONFIG: Readonly<SearchConfig> = Object.freeze({
  topK: 5,
  limitMultiplier: 2,
  rrfK: 60,
  rerankThreshold: 0,
  searchTimeoutMs: 10_000,
  rerankTimeoutMs: 5_000,
});

export interface HybridRetrieverDeps {
  embeddingProvider: IEmbeddingProvider;
  sparseEncoder: ISparseEncoder;
  vectorStore: IVectorStore;
  reranker?: IRerankScorer;
  config?: Partial<SearchConfig>;
  logger?: Logger;
}

export interface SearchOptions {
  signal?: AbortSignal;
  trace?: TraceSink;
}

type Channel = "dense" | "sparse";

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Client errors (unknown KB, bad input) are the caller's problem, not a backend outage. */
function isCallerError(error: unknown): boolean {
  return (
    AppError.isAppError(error) &&
    error.statusCode >= 400 &&
    error.statusCode < 500 &&
    error.code !== "RATE_LIMITED"
  );
}

function emptyDiagnostics(): SearchDiagnostics {
  return {
    denseCandidates: 0,
    sparseCandidates: 0,
    fusedCandidates: 0,
    reranked: false,
    duplicatesRemoved: 0,
    warnings: [],
    timings: { totalMs: 0 },
  };
}

/**
 * Dense + sparse retrieval fused with RRF, then optional rerank and dedup.
 * Holds configuration only; every call works on its own locals.
 */
export class HybridRetriever {
  private readonly deps: HybridRetrieverDeps;
  readonly config: Readonly<SearchConfig>;

  constructor(deps: HybridRetrieverDeps) {
    this.deps = deps;
    this.config = Object.freeze({ ...DEFAULT_SEARCH_CONFIG, ...deps.config });
  }

  async search(request: SearchRequest, options?: SearchOptions): Promise<FusedResultSet> {
    const started = performance.now();
    const signal = options?.signal;
    const trace = options?.trace ?? noopTraceSink;
    const topK = request.topK ?? this.config.topK;
    const { query, knowledgeBase } = request;

    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError("topK must be a positive integer", { topK: String(topK) });
    }

    const diagnostics = emptyDiagnostics();
    const finish = (hits: SearchHit[]): FusedResultSet => {
      diagnostics.timings.totalMs = performance.now() - started;
      trace.event("search.complete", {
        knowledgeBase,
        hits: hits.length,
        warnings: diagnostics.warnings.length,
        totalMs: diagnostics.timings.totalMs,
      });
      return {
        query,
        knowledgeBase,
        hits,
        formattedContext: assembleContext(hits, request.targetModel ?? "generic"),
        sourceSummary: summarizeSources(hits),
        diagnostics,
      };
    };

    if (query.trim().length === 0) {
      return finish([]);
    }

    const candidateLimit = topK * this.config.limitMultiplier;
    const { dense, sparse } = await this.searchChannels(request, candidateLimit, diagnostics, signal);
    diagnostics.denseCandidates = dense.length;
    diagnostics.sparseCandidates = sparse.length;

    const fused = reciprocalRankFusion(dense, sparse, this.config.rrfK).slice(0, candidateLimit);
    diagnostics.fusedCandidates = fused.length;
    trace.event("search.fused", {
      knowledgeBase,
      dense: dense.length,
      sparse: sparse.length,
      fused: fused.length,
    });

    if (fused.length === 0) {
      return finish([]);
    }

    let hits = await this.hydrate(knowledgeBase, fused, signal);

    if (request.useRerank ?? this.deps.reranker !== undefined) {
      hits = await this.rerank(query, hits, diagnostics, signal, trace);
    }

    if (request.deduplicate ?? true) {
      const { kept, removed } = deduplicateHits(hits);
      hits = kept;
      diagnostics.duplicatesRemoved = removed;
    }

    return finish(hits.slice(0, topK).map((hit, index) => ({ ...hit, rank: index + 1 })));
  }

  private async searchChannels(
    request: SearchRequest,
    limit: number,
    diagnostics: SearchDiagnostics,
    signal: AbortSignal | undefined,
  ): Promise<Record<Channel, VectorMatch[]>> {
    const { query, knowledgeBase } = request;
    const { vectorStore, embeddingProvider, sparseEncoder } = this.deps;
    const timeoutMs = this.config.searchTimeoutMs;

    const denseChannel = withTimeout(
      async (channelSignal) => {
        const vector =
          request.queryVector ??
          (await embeddingProvider.embed(query, { inputType: "query", signal: channelSignal }))
            .embeddings[0];
        if (!vector) {
          throw new ExternalServiceError("Embedding provider returned no query vector", embeddingProvider.name);
        }
        return vectorStore.denseSearch(knowledgeBase, vector, limit);
      },
      { timeoutMs, service: "dense-search", signal },
    );

    const sparseVector: SparseVector = request.sparseVector ?? sparseEncoder.encodeQuery(query);
    const sparseChannel =
      sparseVector.indices.length === 0
        ? Promise.resolve<VectorMatch[]>([])
        : withTimeout(() => vectorStore.sparseSearch(knowledgeBase, sparseVector, limit), {
            timeoutMs,
            service: "sparse-search",
            signal,
          });

    const [denseResult, sparseResult] = await Promise.allSettled([denseChannel, sparseChannel]);

    if (signal?.aborted) {
      throw new CancelledError("Search cancelled");
    }

    const failures: Array<{ channel: Channel; error: unknown }> = [];
    if (denseResult.status === "rejected") failures.push({ channel: "dense", error: denseResult.reason });
    if (sparseResult.status === "rejected") failures.push({ channel: "sparse", error: sparseResult.reason });

    for (const { error } of failures) {
      if (isCallerError(error)) throw error;
    }

    const dense = denseResult.status === "fulfilled" ? denseResult.value : [];
    const sparse = sparseResult.status === "fulfilled" ? sparseResult.value : [];

    if (failures.length > 0) {
      const summary = failures.map((f) => `${f.channel} search failed: ${describeError(f.error)}`);
      if (failures.length === 2 || dense.length + sparse.length === 0) {
        throw new SearchBackendUnavailableError("vector-store", summary.join("; "), {
          cause: failures[0]?.error,
        });
      }
      diagnostics.warnings.push(...summary);
      this.deps.logger?.warn({ knowledgeBase, warnings: summary }, "search channel failed, continuing with the other");
    }

    return { dense, sparse };
  }

  private async hydrate(
    knowledgeBase: string,
    candidates: readonly FusedCandidate[],
    signal: AbortSignal | undefined,
  ): Promise<SearchHit[]> {
    let chunks: Map<string, StoredChunk>;
    try {
      chunks = await withTimeout(
        () => this.deps.vectorStore.fetchChunks(knowledgeBase, candidates.map((c) => c.chunkId)),
        { timeoutMs: this.config.searchTimeoutMs, service: "fetch-chunks", signal },
      );
    } catch (error: unknown) {
      if (error instanceof CancelledError || isCallerError(error) || error instanceof SearchBackendUnavailableError) {
        throw error;
      }
      throw new SearchBackendUnavailableError("vector-store", `fetching chunks failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    const hits: SearchHit[] = [];
    for (const candidate of candidates) {
      const chunk = chunks.get(candidate.chunkId);
      // Deleted between search and fetch
      if (!chunk) continue;

      const { sourceFile, page, section } = chunk.metadata;
      hits.push({
        ...candidate,
        text: chunk.text,
        source: {
          sourceFile,
          ...(page !== undefined ? { page } : {}),
          ...(section !== undefined ? { section } : {}),
          documentId: chunk.documentId,
        },
        rerankScore: null,
        rank: 0,
      });
    }
    return hits;
  }

  private async rerank(
    query: string,
    hits: SearchHit[],
    diagnostics: SearchDiagnostics,
    signal: AbortSignal | undefined,
    trace: TraceSink,
  ): Promise<SearchHit[]> {
    const reranker = this.deps.reranker;
    if (!reranker) {
      diagnostics.warnings.push("reranking skipped: no reranker configured");
      return hits;
    }
    if (hits.length === 0) {
      return hits;
    }

    const started = performance.now();
    let scores: number[];
    try {
      scores = await withTimeout((s) => reranker.score(query, hits.map((h) => h.text), s), {
        timeoutMs: this.config.rerankTimeoutMs,
        service: "reranker",
        signal,
      });
      if (scores.length !== hits.length) {
        throw new ExternalServiceError(
          `reranker returned ${String(scores.length)} scores for ${String(hits.length)} passages`,
          reranker.name,
        );
      }
    } catch (error: unknown) {
      if (error instanceof CancelledError || signal?.aborted) {
        throw error instanceof CancelledError ? error : new CancelledError("Search cancelled");
      }
      const warning = `reranking skipped: ${describeError(error)}`;
      diagnostics.warnings.push(warning);
      trace.event("search.rerank.skipped", { reason: describeError(error) });
      this.deps.logger?.warn({ reranker: reranker.name, err: error }, warning);
      return hits;
    } finally {
      diagnostics.timings.rerankMs = performance.now() - started;
    }

    diagnostics.reranked = true;
    const threshold = this.config.rerankThreshold;
    return hits
      .map((hit, i) => ({ ...hit, rerankScore: scores[i] ?? null }))
      .filter((hit) => threshold <= 0 || (hit.rerankScore ?? 0) >= threshold)
      .sort((a, b) => (b.rerankScore ?? 0) - (a.rerankScore ?? 0) || a.rrfRank - b.rrfRank);
  }
}
