import type {
  IKnowledgeBaseStore,
  KnowledgeBaseDescriptor,
  RouteMatch,
  RouteResult,
  TraceSink,
} from "@stratarag/types";
import { ValidationError } from "@stratarag/errors";
import type { IEmbeddingProvider } from "@stratarag/embeddings";
import { cosineSimilarity } from "@stratarag/vector-store";
import type { Logger } from "@stratarag/logger";
import { noopTraceSink } from "@stratarag/logger";

export const DEFAULT_SIMILARITY_FLOOR = 0.5;

export interface RoutingEntry {
  readonly name: string;
  readonly description: string;
  readonly category: string;
  readonly embedding: readonly number[];
}

export interface RoutingIndex {
  readonly entries: readonly RoutingEntry[];
  /** Embedding size shared by every entry; undefined when the index is empty. */
  readonly dimensions: number | undefined;
}

export interface RouteOptions {
  topK?: number;
  /** Only consider these knowledge bases. */
  candidates?: readonly string[];
  floor?: number;
  trace?: TraceSink;
}

export interface SemanticRouterDeps {
  store: IKnowledgeBaseStore;
  embeddingProvider: IEmbeddingProvider;
  floor?: number;
  logger?: Logger;
}

/**
 * Rank `entries` by cosine similarity to the query. A match must score
 * strictly above `floor`; equal scores keep index order.
 */
export function selectRoutes(
  queryEmbedding: readonly number[],
  entries: readonly RoutingEntry[],
  floor: number,
  topK: number,
): RouteResult {
  const comparable = entries.filter((e) => e.embedding.length === queryEmbedding.length);
  if (comparable.length === 0) {
    return { knowledgeBase: null, score: 0, matches: [], reason: "no-descriptors" };
  }

  // Array.prototype.sort is stable, so ties stay in insertion order
  const scored = comparable
    .map((entry) => ({ entry, score: cosineSimilarity(queryEmbedding, entry.embedding) }))
    .sort((a, b) => b.score - a.score);

  const bestScore = scored[0]?.score ?? 0;
  const matches: RouteMatch[] = scored
    .filter(({ score }) => score > floor)
    .slice(0, topK)
    .map(({ entry, score }) => ({
      knowledgeBase: entry.name,
      score,
      description: entry.description,
      category: entry.category,
    }));

  const top = matches[0];
  if (!top) {
    return { knowledgeBase: null, score: bestScore, matches: [], reason: "below-floor" };
  }
  return { knowledgeBase: top.knowledgeBase, score: top.score, matches };
}

/**
 * Picks a knowledge base for a query from the descriptors' embeddings.
 *
 * The index is an immutable snapshot swapped whole on refresh. Routing only
 * reads the current snapshot; refreshes run one at a time, and the first
 * lookup loads the index lazily.
 */
export class SemanticRouter {
  private readonly store: IKnowledgeBaseStore;
  private readonly embeddingProvider: IEmbeddingProvider;
  private readonly floor: number;
  private readonly logger?: Logger;
  private snapshot: RoutingIndex | undefined;
  private initialLoad: Promise<RoutingIndex> | undefined;
  private refreshQueue: Promise<void> = Promise.resolve();

  constructor(deps: SemanticRouterDeps) {
    this.store = deps.store;
    this.embeddingProvider = deps.embeddingProvider;
    this.floor = deps.floor ?? DEFAULT_SIMILARITY_FLOOR;
    this.logger = deps.logger;
  }

  async index(): Promise<RoutingIndex> {
    if (this.snapshot) {
      return this.snapshot;
    }
    if (!this.initialLoad) {
      this.initialLoad = this.refresh().catch((error: unknown) => {
        this.initialLoad = undefined;
        throw error;
      });
    }
    return this.initialLoad;
  }

  /** Rebuild from the store. Concurrent calls queue behind each other. */
  refresh(): Promise<RoutingIndex> {
    const run = this.refreshQueue.then(async () => {
      const next = this.build(await this.store.list());
      this.snapshot = next;
      return next;
    });
    // The queue only orders refreshes; each caller still sees its own failure through `run`
    this.refreshQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async route(queryEmbedding: readonly number[], options?: RouteOptions): Promise<RouteResult> {
    const index = await this.index();
    const trace = options?.trace ?? noopTraceSink;

    if (index.dimensions !== undefined && index.dimensions !== queryEmbedding.length) {
      throw new ValidationError(
        `Query embedding has ${String(queryEmbedding.length)} dimensions, routing index has ${String(index.dimensions)}`,
        { queryEmbedding: "dimension mismatch" },
      );
    }

    const candidates = options?.candidates;
    const entries = candidates ? index.entries.filter((e) => candidates.includes(e.name)) : index.entries;
    const result = selectRoutes(queryEmbedding, entries, options?.floor ?? this.floor, options?.topK ?? 1);

    trace.event("router.route", {
      knowledgeBase: result.knowledgeBase,
      score: result.score,
      reason: result.reason,
    });
    return result;
  }

  async routeQuery(
    query: string,
    options?: RouteOptions & { signal?: AbortSignal },
  ): Promise<RouteResult> {
    if (query.trim().length === 0) {
      throw new ValidationError("Query must not be empty", { query: "required" });
    }
    const { embeddings } = await this.embeddingProvider.embed(query, {
      inputType: "query",
      signal: options?.signal,
    });
    const vector = embeddings[0];
    if (!vector) {
      throw new ValidationError("Embedding provider returned no vector for the query", { query: "unembeddable" });
    }
    return this.route(vector, options);
  }

  private build(descriptors: readonly KnowledgeBaseDescriptor[]): RoutingIndex {
    const dimensions = descriptors[0]?.descriptionEmbedding.length;
    const entries: RoutingEntry[] = [];
    const skipped: string[] = [];

    for (const descriptor of descriptors) {
      if (descriptor.descriptionEmbedding.length !== dimensions) {
        skipped.push(descriptor.name);
        continue;
      }
      entries.push(
        Object.freeze({
          name: descriptor.name,
          description: descriptor.description,
          category: descriptor.category,
          embedding: Object.freeze([...descriptor.descriptionEmbedding]),
        }),
      );
    }

    if (skipped.length > 0) {
      this.logger?.warn(
        { skipped, dimensions },
        "knowledge bases left out of routing: embedding dimension differs from the index",
      );
    }

    return Object.freeze({ entries: Object.freeze(entries), dimensions });
  }
}
