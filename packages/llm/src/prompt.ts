import type { ConversationTurn } from "@stratarag/types";
import type { LlmRequest } from "./llm-gateway.interface.js";

export const DEFAULT_HISTORY_TOKEN_LIMIT = 3000;

const CHARS_PER_TOKEN = 4;

export const SYSTEM_PROMPT = [
  "You answer questions using the retrieved context provided below.",
  "Cite sources by their index, for example [1].",
  "If the context does not contain the answer, say that you do not know.",
].join(" ");

export const NO_CONTEXT_NOTE =
  "No knowledge base matched this question. Answer briefly from general knowledge and state that no documents were consulted.";

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Keep the most recent turns whose combined estimate fits the budget.
 * Stops at the first turn that does not fit, so the kept turns stay contiguous.
 */
export function trimHistory(
  history: readonly ConversationTurn[],
  tokenLimit: number = DEFAULT_HISTORY_TOKEN_LIMIT,
): ConversationTurn[] {
  const kept: ConversationTurn[] = [];
  let used = 0;
  for (let i = history.length - 1; i >= 0; i--) {
    const turn = history[i];
    if (!turn) continue;
    const cost = estimateTokens(turn.content);
    if (used + cost > tokenLimit) break;
    used += cost;
    kept.unshift(turn);
  }
  return kept;
}

export interface BuildPromptInput {
  query: string;
  /** Empty when nothing was retrieved. */
  formattedContext: string;
  history?: readonly ConversationTurn[];
  historyTokenLimit?: number;
  temperature?: number;
}

export function buildPrompt(input: BuildPromptInput): LlmRequest {
  const context = input.formattedContext.trim();
  const system = context.length > 0 ? `${SYSTEM_PROMPT}\n\nContext:\n${context}` : NO_CONTEXT_NOTE;

  return {
    system,
    messages: [
      ...trimHistory(input.history ?? [], input.historyTokenLimit),
      { role: "user", content: input.query },
    ],
    ...(input.temperature !== undefined ? { temperature: input.temperature } : {}),
  };
}
