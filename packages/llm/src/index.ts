export type { ILlmGateway, LlmRequest, LlmResponse } from "./llm-gateway.interface.js";
export { CohereChatGateway } from "./cohere-chat.js";
export type { CohereChatConfig } from "./cohere-chat.js";
export {
  DEFAULT_HISTORY_TOKEN_LIMIT,
  NO_CONTEXT_NOTE,
  SYSTEM_PROMPT,
  buildPrompt,
  estimateTokens,
  trimHistory,
} from "./prompt.js";
export type { BuildPromptInput } from "./prompt.js";
export { createLlmGateway } from "./factory.js";
export {
  LlmMetadataExtractor,
  METADATA_SAMPLE_CHARS,
  heuristicMetadata,
  parseMetadataReply,
} from "./metadata-extractor.js";
