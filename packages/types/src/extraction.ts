/** Extraction strategies in ascending default cost. */
export const EXTRACTION_TIERS = ["fast", "balanced", "premium"] as const;

export type ExtractionTier = (typeof EXTRACTION_TIERS)[number];

export interface TierProfile {
  tier: ExtractionTier;
  costPerPageUsd: number;
  timeoutMs: number;
  enabled: boolean;
}

export interface ExtractionDocument {
  documentId: string;
  fileName: string;
  mimeType: string;
  content: Uint8Array | string;
  pageCountHint?: number;
}

/** What a tier client returns for one successful attempt. */
export interface TierOutput {
  pages: string[];
  costUsd: number;
  durationMs: number;
  model?: string;
}

export interface IExtractionTierClient {
  readonly tier: ExtractionTier;
  supports(mimeType: string): boolean;
  extract(document: ExtractionDocument, profile: TierProfile, signal: AbortSignal): Promise<TierOutput>;
}

export const QUALITY_DIMENSIONS = [
  "cleanliness",
  "wordIntegrity",
  "consistency",
  "structure",
  "density",
] as const;

export type QualityDimension = (typeof QUALITY_DIMENSIONS)[number];

export type QualityRecommendation = "excellent" | "good" | "fair" | "poor";

export type QualityWeights = Record<QualityDimension, number>;

export interface DimensionReport {
  score: number;
  weight: number;
  signals: Record<string, number>;
  issues: string[];
}

export interface QualityReport {
  overallScore: number;
  recommendation: QualityRecommendation;
  dimensions: Record<QualityDimension, DimensionReport>;
  issues: string[];
  stats: {
    pages: number;
    chars: number;
    words: number;
  };
}

export interface ExtractionAttempt {
  readonly tier: ExtractionTier;
  readonly pages: readonly string[];
  readonly durationMs: number;
  readonly costUsd: number;
  readonly quality: QualityReport;
  readonly model?: string;
}

export type TierFailureCode = "TIER_UNAVAILABLE" | "RATE_LIMITED" | "EXTRACTION_EMPTY" | "TIMEOUT";

export interface TierFailure {
  tier: ExtractionTier;
  code: TierFailureCode;
  message: string;
}

export interface ExtractionResult {
  selected: ExtractionAttempt;
  attempts: ExtractionAttempt[];
  tiersTried: ExtractionTier[];
  failures: TierFailure[];
  escalationReason: string;
  totalCostUsd: number;
  totalDurationMs: number;
  cancelled: boolean;
}
