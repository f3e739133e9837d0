import { EXTRACTION_TIERS } from "@stratarag/types";
import type { ExtractionConfig, ExtractionTier, TierProfile } from "@stratarag/types";

type TierDefaults = Pick<TierProfile, "costPerPageUsd">;

/**
 * Default cost per tier, with the quality each usually tops out at.
 *
 * - **fast**     – local layout-aware extraction, free (~0.80)
 * - **balanced** – low-cost vision model (~0.90)
 * - **premium**  – strongest vision model, billed per page (~0.98)
 */
export const DEFAULT_TIER_PROFILES: Record<ExtractionTier, TierDefaults> = {
  fast: { costPerPageUsd: 0 },
  balanced: { costPerPageUsd: 0 },
  premium: { costPerPageUsd: 0.0013 },
};

/**
 * Sort tiers by ascending cost; equal costs keep the fast < balanced < premium order.
 */
export function orderTiers<T extends Pick<TierProfile, "tier" | "costPerPageUsd">>(
  profiles: readonly T[],
): T[] {
  return [...profiles].sort(
    (a, b) =>
      a.costPerPageUsd - b.costPerPageUsd ||
      EXTRACTION_TIERS.indexOf(a.tier) - EXTRACTION_TIERS.indexOf(b.tier),
  );
}

/**
 * Build the full tier profile list from config. Vision tiers are only
 * enabled when an OpenRouter key is present.
 */
export function resolveTierProfiles(
  config: ExtractionConfig,
  overrides?: Partial<Record<ExtractionTier, Partial<TierDefaults>>>,
): TierProfile[] {
  const profiles = EXTRACTION_TIERS.map((tier): TierProfile => {
    const needsKey = tier !== "fast";
    return {
      tier,
      ...DEFAULT_TIER_PROFILES[tier],
      ...overrides?.[tier],
      timeoutMs: config.tierTimeoutMs,
      enabled: config.enabledTiers[tier] && (!needsKey || Boolean(config.openRouterApiKey)),
    };
  });
  return orderTiers(profiles);
}

/** Enabled tiers only, cheapest first. */
export function enabledTiers(profiles: readonly TierProfile[]): ExtractionTier[] {
  return orderTiers(profiles.filter((p) => p.enabled)).map((p) => p.tier);
}
