import type {
  EmbeddingResult,
  ExtractionTier,
  IExtractionTierClient,
  QualityReport,
  TierOutput,
  TierProfile,
} from "@stratarag/types";
import type { EmbedOptions, IEmbeddingProvider } from "@stratarag/embeddings";
import { QualityScorer } from "../quality-scorer.js";

export function profile(tier: ExtractionTier, overrides?: Partial<TierProfile>): TierProfile {
  const costs: Record<ExtractionTier, number> = { fast: 0, balanced: 0.0005, premium: 0.0013 };
  return {
    tier,
    costPerPageUsd: costs[tier],
    timeoutMs: 1_000,
    enabled: true,
    ...overrides,
  };
}

export type TierBehaviour = (signal: AbortSignal) => Promise<TierOutput>;

export interface FakeTierClient extends IExtractionTierClient {
  calls: number;
}

export function tierClient(tier: ExtractionTier, behaviour: TierBehaviour, mimeTypes?: string[]): FakeTierClient {
  const client: FakeTierClient = {
    tier,
    calls: 0,
    supports: (mimeType) => !mimeTypes || mimeTypes.includes(mimeType),
    extract: (_document, _profile, signal) => {
      client.calls++;
      return behaviour(signal);
    },
  };
  return client;
}

export const output = (pages: string[], costUsd = 0): TierOutput => ({ pages, costUsd, durationMs: 1 });

export const returns =
  (pages: string[], costUsd = 0): TierBehaviour =>
  async () =>
    output(pages, costUsd);

export const fails =
  (error: Error): TierBehaviour =>
  async () => {
    throw error;
  };

/** Settles only when the signal aborts. */
export const hangs: TierBehaviour = (signal) =>
  new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });

/**
 * Reads the score from the first page, e.g. `score:0.72`, so extraction tests
 * control quality without crafting text.
 */
export class PageScoreScorer extends QualityScorer {
  override score(pages: readonly string[]): QualityReport {
    const report = super.score(pages);
    const match = /^score:([\d.]+)/.exec(pages[0] ?? "");
    return match?.[1] ? { ...report, overallScore: Number(match[1]) } : report;
  }
}

/**
 * Embeds known texts to fixed vectors and anything else to `fallback`.
 */
export class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly dimensions: number;
  readonly requests: Array<{ texts: string[]; options?: EmbedOptions }> = [];
  private vectors: Map<string, number[]>;
  private fallback: number[];

  constructor(vectors: Record<string, number[]> = {}, fallback: number[] = [1, 0, 0]) {
    this.vectors = new Map(Object.entries(vectors));
    this.fallback = fallback;
    this.dimensions = fallback.length;
  }

  async embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult> {
    return this.batchEmbed([text], { inputType: "query", ...options });
  }

  async batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult> {
    this.requests.push({ texts, options });
    return {
      embeddings: texts.map((text) => [...(this.vectors.get(text) ?? this.fallback)]),
      model: "fake-embed",
      tokensUsed: texts.reduce((sum, t) => sum + t.length, 0),
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}
