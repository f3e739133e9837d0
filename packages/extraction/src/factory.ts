import type { ExtractionConfig, ExtractionTier, IExtractionTierClient } from "@stratarag/types";
import type { Logger } from "@stratarag/logger";
import { DoclingTierClient } from "./docling-client.js";
import { MimeRoutedTierClient } from "./mime-routed-client.js";
import { PlainTextTierClient } from "./text-client.js";
import { VisionTierClient } from "./vision-client.js";
import type { VisionBackoffPolicy } from "./vision-client.js";

export interface CreateTierClientsOptions {
  logger?: Logger;
  backoff?: Partial<VisionBackoffPolicy>;
  fetch?: typeof fetch;
}

/**
 * Build one client per tier. Vision tiers are left out without an OpenRouter key.
 */
export function createTierClients(
  config: ExtractionConfig,
  options?: CreateTierClientsOptions,
): Partial<Record<ExtractionTier, IExtractionTierClient>> {
  const clients: Partial<Record<ExtractionTier, IExtractionTierClient>> = {
    fast: new MimeRoutedTierClient("fast", [
      new PlainTextTierClient(),
      new DoclingTierClient({
        pythonPath: config.doclingPythonPath,
        scriptPath: config.doclingScriptPath,
      }),
    ]),
  };

  const apiKey = config.openRouterApiKey;
  if (apiKey) {
    const vision = (tier: "balanced" | "premium", model: string): VisionTierClient =>
      new VisionTierClient({
        tier,
        apiKey,
        model,
        baseUrl: config.openRouterBaseUrl,
        backoff: options?.backoff,
        logger: options?.logger,
        fetch: options?.fetch,
      });
    clients.balanced = vision("balanced", config.balancedModel);
    clients.premium = vision("premium", config.premiumModel);
  }

  return clients;
}
