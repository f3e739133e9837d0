import type { ConversationTurn } from "@stratarag/types";

export interface LlmRequest {
  system: string;
  /** Oldest first; the last entry is the user's question. */
  messages: ConversationTurn[];
  temperature?: number;
}

export interface LlmResponse {
  text: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
}

export interface ILlmGateway {
  readonly name: string;
  generate(request: LlmRequest, signal?: AbortSignal): Promise<LlmResponse>;
}
