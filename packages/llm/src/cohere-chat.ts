import { CohereClient } from "cohere-ai";
import type { Cohere } from "cohere-ai";
import { mapCohereError } from "@stratarag/embeddings";
import type { ILlmGateway, LlmRequest, LlmResponse } from "./llm-gateway.interface.js";
import { estimateTokens } from "./prompt.js";

const DEFAULT_MODEL = "command-r-plus-08-2024";

export interface CohereChatConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
  client?: CohereClient;
}

export class CohereChatGateway implements ILlmGateway {
  readonly name = "cohere";
  private client: CohereClient;
  private model: string;
  private temperature: number | undefined;

  constructor(config: CohereChatConfig) {
    this.client = config.client ?? new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.temperature = config.temperature;
  }

  async generate(request: LlmRequest, signal?: AbortSignal): Promise<LlmResponse> {
    const messages: Cohere.ChatMessageV2[] = [
      { role: "system", content: request.system },
      ...request.messages.map((turn): Cohere.ChatMessageV2 =>
        turn.role === "user"
          ? { role: "user", content: turn.content }
          : { role: "assistant", content: turn.content },
      ),
    ];
    const temperature = request.temperature ?? this.temperature;

    const response = await this.client.v2
      .chat(
        {
          model: this.model,
          messages,
          ...(temperature !== undefined ? { temperature } : {}),
        },
        { abortSignal: signal },
      )
      .catch((error: unknown) => {
        throw mapCohereError(error, "chat");
      });

    const text = (response.message.content ?? [])
      .map((item) => (item.type === "text" ? item.text : ""))
      .join("");

    // Billed units are absent on some trial keys; fall back to the estimate
    const billed = response.usage?.billedUnits;
    const promptText = request.system + request.messages.map((m) => m.content).join("");
    return {
      text,
      model: this.model,
      inputTokens: billed?.inputTokens ?? estimateTokens(promptText),
      outputTokens: billed?.outputTokens ?? estimateTokens(text),
    };
  }
}
