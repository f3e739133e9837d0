import type {
  ExtractionAttempt,
  ExtractionDocument,
  ExtractionResult,
  ExtractionTier,
  IExtractionTierClient,
  TierFailure,
  TierProfile,
  TraceSink,
} from "@stratarag/types";
import {
  AllTiersExhaustedError,
  CancelledError,
  ExtractionEmptyError,
  RateLimitedError,
  TierUnavailableError,
  TimeoutError,
  ValidationError,
  withTimeout,
} from "@stratarag/errors";
import { orderTiers } from "@stratarag/config";
import type { Logger } from "@stratarag/logger";
import { noopTraceSink } from "@stratarag/logger";
import { QualityScorer } from "./quality-scorer.js";

export type TierClients = Partial<Record<ExtractionTier, IExtractionTierClient>>;

export interface ProgressiveExtractorDeps {
  clients: TierClients;
  profiles: readonly TierProfile[];
  scorer?: QualityScorer;
  logger?: Logger;
}

export interface ExtractOptions {
  targetQuality: number;
  /** Restrict to these tiers; still tried in ascending cost order. */
  tiers?: readonly ExtractionTier[];
  signal?: AbortSignal;
  trace?: TraceSink;
}

export interface PlannedTier {
  profile: TierProfile;
  client: IExtractionTierClient;
}

export function toTierFailure(tier: ExtractionTier, error: unknown): TierFailure {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof RateLimitedError) return { tier, code: "RATE_LIMITED", message };
  if (error instanceof ExtractionEmptyError) return { tier, code: "EXTRACTION_EMPTY", message };
  if (error instanceof TimeoutError) return { tier, code: "TIMEOUT", message };
  return { tier, code: "TIER_UNAVAILABLE", message };
}

/**
 * Tries extraction tiers cheapest first, one at a time, and stops as soon as
 * a tier meets the target quality. Returns the best-scoring attempt.
 */
export class ProgressiveExtractor {
  private readonly clients: TierClients;
  private readonly profiles: readonly TierProfile[];
  private readonly scorer: QualityScorer;
  private readonly logger?: Logger;

  constructor(deps: ProgressiveExtractorDeps) {
    this.clients = deps.clients;
    this.profiles = deps.profiles;
    this.scorer = deps.scorer ?? new QualityScorer();
    this.logger = deps.logger;
  }

  /** Enabled tiers that have a client, cheapest first. */
  plan(tiers?: readonly ExtractionTier[]): PlannedTier[] {
    const planned: PlannedTier[] = [];
    for (const profile of orderTiers(this.profiles)) {
      const client = this.clients[profile.tier];
      if (!profile.enabled || !client || (tiers && !tiers.includes(profile.tier))) {
        continue;
      }
      planned.push({ profile, client });
    }
    return planned;
  }

  async extract(document: ExtractionDocument, options: ExtractOptions): Promise<ExtractionResult> {
    const { targetQuality, signal } = options;
    const trace = options.trace ?? noopTraceSink;
    const plan = this.plan(options.tiers);

    if (plan.length === 0) {
      throw new ValidationError("No extraction tier is enabled", {
        tiers: options.tiers ? options.tiers.join(",") : "none configured",
      });
    }

    const started = performance.now();
    const attempts: ExtractionAttempt[] = [];
    const tiersTried: ExtractionTier[] = [];
    const failures: TierFailure[] = [];
    let best: ExtractionAttempt | undefined;
    let reason: string | undefined;
    let cancelled = false;

    for (const { profile, client } of plan) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      const tier = profile.tier;
      tiersTried.push(tier);
      trace.event("extraction.tier.start", { documentId: document.documentId, tier });

      try {
        const attempt = await this.attempt(document, profile, client, signal);
        attempts.push(attempt);
        if (!best || attempt.quality.overallScore > best.quality.overallScore) {
          best = attempt;
        }

        const score = attempt.quality.overallScore;
        trace.event("extraction.tier.success", {
          documentId: document.documentId,
          tier,
          score,
          costUsd: attempt.costUsd,
          durationMs: attempt.durationMs,
        });

        if (score >= targetQuality) {
          reason = `met target at tier ${tier} (${score.toFixed(2)} >= ${targetQuality.toFixed(2)})`;
          break;
        }
      } catch (error: unknown) {
        if (error instanceof CancelledError || signal?.aborted) {
          cancelled = true;
          break;
        }
        const failure = toTierFailure(tier, error);
        failures.push(failure);
        trace.event("extraction.tier.failure", {
          documentId: document.documentId,
          tier,
          code: failure.code,
          message: failure.message,
        });
        this.logger?.warn({ documentId: document.documentId, tier, code: failure.code }, failure.message);
      }
    }

    const lastTier = tiersTried[tiersTried.length - 1];
    if (cancelled) {
      if (!best || lastTier === undefined) {
        throw new CancelledError("Extraction cancelled before any tier produced text");
      }
      reason = `cancelled after ${lastTier}, returning best of ${String(attempts.length)}`;
    }

    if (!best) {
      throw new AllTiersExhaustedError(failures);
    }

    const result: ExtractionResult = {
      selected: best,
      attempts,
      tiersTried,
      failures,
      escalationReason: reason ?? `exhausted all tiers, returning best of ${String(attempts.length)}`,
      totalCostUsd: attempts.reduce((sum, a) => sum + a.costUsd, 0),
      totalDurationMs: performance.now() - started,
      cancelled,
    };

    trace.event("extraction.complete", {
      documentId: document.documentId,
      selectedTier: best.tier,
      score: best.quality.overallScore,
      tiersTried,
      cancelled,
      reason: result.escalationReason,
    });

    return result;
  }

  private async attempt(
    document: ExtractionDocument,
    profile: TierProfile,
    client: IExtractionTierClient,
    signal: AbortSignal | undefined,
  ): Promise<ExtractionAttempt> {
    const tier = profile.tier;
    if (!client.supports(document.mimeType)) {
      throw new TierUnavailableError(tier, `${tier} tier does not support ${document.mimeType}`);
    }

    const started = performance.now();
    const output = await withTimeout((tierSignal) => client.extract(document, profile, tierSignal), {
      timeoutMs: profile.timeoutMs,
      service: `tier:${tier}`,
      signal,
    });

    if (output.pages.every((page) => page.trim().length === 0)) {
      throw new ExtractionEmptyError(tier, `${tier} tier returned no text`);
    }

    return Object.freeze({
      tier,
      pages: Object.freeze([...output.pages]),
      durationMs: performance.now() - started,
      costUsd: output.costUsd,
      quality: this.scorer.score(output.pages),
      ...(output.model !== undefined ? { model: output.model } : {}),
    });
  }
}
