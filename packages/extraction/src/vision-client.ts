import { z } from "zod";
import type {
  ExtractionDocument,
  ExtractionTier,
  IExtractionTierClient,
  TierOutput,
  TierProfile,
} from "@stratarag/types";
import {
  AppError,
  ExtractionEmptyError,
  RateLimitedError,
  TierUnavailableError,
  createCircuitBreaker,
  isCircuitOpenError,
  withRetry,
} from "@stratarag/errors";
import type { BackoffPolicy, CircuitBreakerOptions } from "@stratarag/errors";
import type { Logger } from "@stratarag/logger";
import { contentBytes } from "./content.js";
import { cleanExtractedText } from "./text-cleaner.js";

export const VISION_MIME_TYPES = ["application/pdf", "image/png", "image/jpeg", "image/webp"];

export const PAGE_BREAK_MARKER = "<<<PAGE_BREAK>>>";

const EXTRACTION_PROMPT = [
  "Transcribe this document to clean markdown.",
  "Keep headings as # headers, lists as - items and tables as markdown tables.",
  "Do not summarize or add commentary.",
  `Separate pages with a line containing only ${PAGE_BREAK_MARKER}.`,
].join(" ");

const chatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      cost: z.number().optional(),
      total_cost: z.number().optional(),
    })
    .optional(),
});

type ChatCompletion = z.infer<typeof chatCompletionSchema>;

type ContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } }
  | { type: "file"; file: { filename: string; file_data: string } };

interface ChatCompletionRequest {
  model: string;
  messages: Array<{ role: "user"; content: ContentPart[] }>;
}

export interface VisionBackoffPolicy extends BackoffPolicy {
  /** Retry 429 responses as well as 5xx and network failures. */
  retryRateLimited: boolean;
}

export const DEFAULT_VISION_BACKOFF: VisionBackoffPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 8_000,
  jitter: 0.5,
  retryRateLimited: false,
};

export interface VisionTierClientOptions {
  tier: Exclude<ExtractionTier, "fast">;
  apiKey: string;
  model: string;
  baseUrl?: string;
  backoff?: Partial<VisionBackoffPolicy>;
  breaker?: CircuitBreakerOptions;
  logger?: Logger;
  fetch?: typeof fetch;
  random?: () => number;
}

function statusOf(error: TierUnavailableError): number | undefined {
  const status = error.details?.["status"];
  return typeof status === "number" ? status : undefined;
}

/**
 * Vision-model extraction over an OpenAI-compatible chat-completions API.
 * The whole document goes in one request; the model marks page boundaries.
 */
export class VisionTierClient implements IExtractionTierClient {
  readonly tier: Exclude<ExtractionTier, "fast">;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly backoff: VisionBackoffPolicy;
  private readonly fetchImpl: typeof fetch;
  private readonly logger?: Logger;
  private readonly random?: () => number;
  private readonly breaker;

  constructor(options: VisionTierClientOptions) {
    this.tier = options.tier;
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.baseUrl = (options.baseUrl ?? "https://openrouter.ai/api/v1").replace(/\/+$/, "");
    this.backoff = { ...DEFAULT_VISION_BACKOFF, ...options.backoff };
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger;
    this.random = options.random;
    this.breaker = createCircuitBreaker(
      `vision:${options.tier}`,
      (body: ChatCompletionRequest, signal: AbortSignal) => this.post(body, signal),
      {
        timeout: false,
        // Rate limits and cancellations do not count against the backend
        errorFilter: (error) => AppError.isAppError(error) && error.statusCode < 500,
        ...options.breaker,
        logger: options.logger,
      },
    );
  }

  supports(mimeType: string): boolean {
    return VISION_MIME_TYPES.includes(mimeType);
  }

  async extract(
    document: ExtractionDocument,
    profile: TierProfile,
    signal: AbortSignal,
  ): Promise<TierOutput> {
    const started = performance.now();
    const body = this.buildRequest(document);

    const completion = await withRetry(() => this.call(body, signal), {
      policy: this.backoff,
      signal,
      random: this.random,
      shouldRetry: (error) => this.shouldRetry(error, signal),
      onRetry: ({ attempt, delayMs, error }) => {
        this.logger?.warn(
          { tier: this.tier, attempt, delayMs, err: error },
          "vision extraction failed, retrying",
        );
      },
    });

    const pages = splitPages(completion.choices[0]?.message.content ?? "");
    if (pages.length === 0) {
      throw new ExtractionEmptyError(this.tier, `${this.model} returned no text for ${document.fileName}`);
    }

    const usage = completion.usage;
    return {
      pages,
      costUsd: usage?.cost ?? usage?.total_cost ?? pages.length * profile.costPerPageUsd,
      durationMs: performance.now() - started,
      model: completion.model ?? this.model,
    };
  }

  private buildRequest(document: ExtractionDocument): ChatCompletionRequest {
    const dataUrl = `data:${document.mimeType};base64,${contentBytes(document).toString("base64")}`;
    const attachment: ContentPart =
      document.mimeType === "application/pdf"
        ? { type: "file", file: { filename: document.fileName, file_data: dataUrl } }
        : { type: "image_url", image_url: { url: dataUrl } };

    return {
      model: this.model,
      messages: [{ role: "user", content: [{ type: "text", text: EXTRACTION_PROMPT }, attachment] }],
    };
  }

  private shouldRetry(error: unknown, signal: AbortSignal): boolean {
    if (signal.aborted) {
      return false;
    }
    if (error instanceof RateLimitedError) {
      return this.backoff.retryRateLimited;
    }
    if (error instanceof TierUnavailableError) {
      if (error.details?.["circuitOpen"] === true) {
        return false;
      }
      const status = statusOf(error);
      return status === undefined || status >= 500;
    }
    return false;
  }

  private async call(body: ChatCompletionRequest, signal: AbortSignal): Promise<ChatCompletion> {
    try {
      return await this.breaker.fire(body, signal);
    } catch (error: unknown) {
      if (isCircuitOpenError(error)) {
        throw new TierUnavailableError(this.tier, `${this.tier} tier circuit is open`, {
          details: { circuitOpen: true },
          cause: error,
        });
      }
      throw error;
    }
  }

  private async post(body: ChatCompletionRequest, signal: AbortSignal): Promise<ChatCompletion> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error: unknown) {
      if (signal.aborted) {
        throw signal.reason;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TierUnavailableError(this.tier, `Vision request failed: ${reason}`, { cause: error });
    }

    if (response.status === 429) {
      const retryAfter = Number(response.headers.get("retry-after"));
      throw new RateLimitedError(
        `${this.model} is rate limited`,
        Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter : undefined,
        { details: { tier: this.tier } },
      );
    }

    if (!response.ok) {
      throw new TierUnavailableError(this.tier, `Vision API returned ${String(response.status)}`, {
        details: { status: response.status },
      });
    }

    const parsed = chatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new TierUnavailableError(this.tier, "Vision API returned a malformed completion", {
        details: { status: response.status },
      });
    }
    return parsed.data;
  }
}

/** Split on the page marker, clean each page, and drop trailing blank pages. */
export function splitPages(content: string): string[] {
  const pages = content.split(PAGE_BREAK_MARKER).map(cleanExtractedText);
  while (pages.length > 0 && pages[pages.length - 1] === "") {
    pages.pop();
  }
  return pages;
}
