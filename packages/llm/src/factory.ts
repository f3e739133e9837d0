import type { LlmConfig } from "@stratarag/types";
import { ValidationError } from "@stratarag/errors";
import type { ILlmGateway } from "./llm-gateway.interface.js";
import { CohereChatGateway } from "./cohere-chat.js";

export function createLlmGateway(config: LlmConfig): ILlmGateway {
  if (!config.cohereApiKey) {
    throw new ValidationError("Cohere API key is required for answer generation", {
      COHERE_API_KEY: "required",
    });
  }
  return new CohereChatGateway({
    apiKey: config.cohereApiKey,
    model: config.model,
    temperature: config.temperature,
  });
}
