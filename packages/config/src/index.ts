export { envSchema, parseEnv } from "./env.js";
export type { ParsedEnv } from "./env.js";
export { DEFAULT_TIER_PROFILES, orderTiers, resolveTierProfiles, enabledTiers } from "./tiers.js";
