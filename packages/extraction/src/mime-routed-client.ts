import type {
  ExtractionDocument,
  ExtractionTier,
  IExtractionTierClient,
  TierOutput,
  TierProfile,
} from "@stratarag/types";
import { TierUnavailableError } from "@stratarag/errors";

/**
 * One tier served by several backends, picked by MIME type. The fast tier
 * uses Docling for office formats and plain decoding for text.
 */
export class MimeRoutedTierClient implements IExtractionTierClient {
  readonly tier: ExtractionTier;
  private readonly clients: readonly IExtractionTierClient[];

  constructor(tier: ExtractionTier, clients: readonly IExtractionTierClient[]) {
    this.tier = tier;
    this.clients = clients;
  }

  supports(mimeType: string): boolean {
    return this.clients.some((client) => client.supports(mimeType));
  }

  extract(document: ExtractionDocument, profile: TierProfile, signal: AbortSignal): Promise<TierOutput> {
    const client = this.clients.find((c) => c.supports(document.mimeType));
    if (!client) {
      return Promise.reject(
        new TierUnavailableError(this.tier, `No ${this.tier} extractor for ${document.mimeType}`),
      );
    }
    return client.extract(document, profile, signal);
  }
}
