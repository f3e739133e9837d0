import { describe, it, expect } from "vitest";
import type { ExtractionDocument, TierProfile } from "@stratarag/types";
import { PlainTextTierClient, stripHtml } from "./text-client.js";

const profile: TierProfile = {
  tier: "fast",
  costPerPageUsd: 0.5,
  timeoutMs: 1_000,
  enabled: true,
};

function doc(content: string | Uint8Array, mimeType = "text/plain"): ExtractionDocument {
  return { documentId: "doc-1", fileName: "notes.txt", mimeType, content };
}

describe("PlainTextTierClient", () => {
  const client = new PlainTextTierClient();
  const signal = new AbortController().signal;

  it("supports text MIME types only", () => {
    expect(client.supports("text/plain")).toBe(true);
    expect(client.supports("text/html")).toBe(true);
    expect(client.supports("application/pdf")).toBe(false);
  });

  it("decodes bytes and splits pages on form feeds", async () => {
    const output = await client.extract(
      doc(new TextEncoder().encode("Page one\fPage two")),
      profile,
      signal,
    );

    expect(output.pages).toEqual(["Page one", "Page two"]);
    expect(output.costUsd).toBe(1);
  });

  it("converts HTML to markdown-ish text", async () => {
    const output = await client.extract(
      doc("<h1>Title</h1><p>Content with <b>bold</b> text</p>", "text/html"),
      profile,
      signal,
    );

    expect(output.pages).toEqual(["# Title\nContent with bold text"]);
  });

  it("rejects documents with no text", async () => {
    await expect(client.extract(doc(" \f \n"), profile, signal)).rejects.toMatchObject({
      code: "EXTRACTION_EMPTY",
      tier: "fast",
    });
  });
});

describe("stripHtml", () => {
  it("drops scripts and styles, keeps list items, decodes entities", () => {
    const html =
      '<script>alert("x")</script><style>b{}</style><ul><li>one</li><li>two &amp; three</li></ul>';

    expect(stripHtml(html)).toBe("- one\n- two & three");
  });
});
