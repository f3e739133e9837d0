import type { AnswerRequest, AnswerResult, FusedResultSet, TraceSink } from "@stratarag/types";
import { ValidationError } from "@stratarag/errors";
import type { IEmbeddingProvider } from "@stratarag/embeddings";
import type { ILlmGateway } from "@stratarag/llm";
import { buildPrompt } from "@stratarag/llm";
import type { Logger } from "@stratarag/logger";
import { noopTraceSink } from "@stratarag/logger";
import type { HybridRetriever } from "./hybrid-retriever.js";
import type { SemanticRouter } from "./semantic-router.js";

export interface AnswerDependencies {
  retriever: HybridRetriever;
  router: SemanticRouter;
  embeddingProvider: IEmbeddingProvider;
  llm: ILlmGateway;
  historyTokenLimit?: number;
  logger?: Logger;
}

interface Retrieved {
  knowledgeBase: string | null;
  routed: boolean;
  results: FusedResultSet | null;
}

async function retrieve(
  request: AnswerRequest,
  deps: AnswerDependencies,
  signal: AbortSignal | undefined,
  trace: TraceSink,
): Promise<Retrieved> {
  const search = {
    query: request.query,
    ...(request.topK !== undefined ? { topK: request.topK } : {}),
    ...(request.useRerank !== undefined ? { useRerank: request.useRerank } : {}),
    ...(request.targetModel !== undefined ? { targetModel: request.targetModel } : {}),
  };

  if (request.knowledgeBase) {
    const results = await deps.retriever.search(
      { ...search, knowledgeBase: request.knowledgeBase },
      { signal, trace },
    );
    return { knowledgeBase: request.knowledgeBase, routed: false, results };
  }

  // Embed once; the vector serves both routing and the dense channel
  const { embeddings } = await deps.embeddingProvider.embed(request.query, { inputType: "query", signal });
  const queryVector = embeddings[0];
  if (!queryVector) {
    throw new ValidationError("Embedding provider returned no vector for the query", { query: "unembeddable" });
  }

  const route = await deps.router.route(queryVector, { trace });
  if (route.knowledgeBase === null) {
    deps.logger?.info({ reason: route.reason, score: route.score }, "no knowledge base matched, answering without context");
    return { knowledgeBase: null, routed: false, results: null };
  }

  const results = await deps.retriever.search(
    { ...search, knowledgeBase: route.knowledgeBase, queryVector },
    { signal, trace },
  );
  return { knowledgeBase: route.knowledgeBase, routed: true, results };
}

/**
 * Route (when no knowledge base is named), retrieve, and generate an answer
 * grounded in the formatted context.
 */
export async function answer(
  request: AnswerRequest,
  deps: AnswerDependencies,
  options?: { signal?: AbortSignal; trace?: TraceSink },
): Promise<AnswerResult> {
  if (request.query.trim().length === 0) {
    throw new ValidationError("Query must not be empty", { query: "required" });
  }

  const signal = options?.signal;
  const trace = options?.trace ?? noopTraceSink;
  const { knowledgeBase, routed, results } = await retrieve(request, deps, signal, trace);

  const prompt = buildPrompt({
    query: request.query,
    formattedContext: results?.formattedContext ?? "",
    history: request.history,
    historyTokenLimit: deps.historyTokenLimit,
  });
  const response = await deps.llm.generate(prompt, signal);

  trace.event("answer.complete", {
    knowledgeBase,
    routed,
    sources: results?.hits.length ?? 0,
    model: response.model,
  });

  return {
    answer: response.text,
    knowledgeBase,
    routed,
    sources: results?.hits ?? [],
    model: response.model,
    tokens: { input: response.inputTokens, output: response.outputTokens },
  };
}
