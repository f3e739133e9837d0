import type {
  ExtractionDocument,
  IExtractionTierClient,
  TierOutput,
  TierProfile,
} from "@stratarag/types";
import { ExtractionEmptyError } from "@stratarag/errors";

export const TEXT_MIME_TYPES = [
  "text/plain",
  "text/markdown",
  "text/csv",
  "text/html",
  "application/json",
  "application/xml",
];

/** Form feed separates pages in plain-text exports. */
const PAGE_SEPARATOR = "\f";

export function stripHtml(html: string): string {
  return html
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
    .replace(/<(h[1-6])[^>]*>([\s\S]*?)<\/\1>/gi, (_, tag: string, inner: string) => {
      const level = Number(tag.slice(1));
      return `\n${"#".repeat(level)} ${inner}\n`;
    })
    .replace(/<li[^>]*>/gi, "\n- ")
    .replace(/<(br|\/p|\/div|\/tr)[^>]*>/gi, "\n")
    .replace(/<[^>]+>/g, " ")
    .replace(/&nbsp;/g, " ")
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/[ \t]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Text formats need no layout analysis: decode, strip markup, split on form feeds.
 */
export class PlainTextTierClient implements IExtractionTierClient {
  readonly tier = "fast";

  supports(mimeType: string): boolean {
    return TEXT_MIME_TYPES.includes(mimeType);
  }

  async extract(
    document: ExtractionDocument,
    profile: TierProfile,
    _signal: AbortSignal,
  ): Promise<TierOutput> {
    const started = performance.now();
    const raw =
      typeof document.content === "string"
        ? document.content
        : new TextDecoder().decode(document.content);
    const text = document.mimeType === "text/html" ? stripHtml(raw) : raw;
    const pages = text.split(PAGE_SEPARATOR).map((page) => page.trim());

    if (pages.every((page) => page.length === 0)) {
      throw new ExtractionEmptyError(this.tier, `${document.fileName} contains no text`);
    }

    return {
      pages,
      costUsd: pages.length * profile.costPerPageUsd,
      durationMs: performance.now() - started,
    };
  }
}
