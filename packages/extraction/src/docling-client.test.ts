import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import type { ExtractionDocument, TierProfile } from "@stratarag/types";
import { CancelledError } from "@stratarag/errors";
import { DoclingTierClient, parseDoclingOutput } from "./docling-client.js";

const FAKE_BRIDGE = fileURLToPath(new URL("./__fixtures__/fake-docling.mjs", import.meta.url));

const profile: TierProfile = {
  tier: "fast",
  costPerPageUsd: 0,
  timeoutMs: 5_000,
  enabled: true,
};

function doc(mimeType: string): ExtractionDocument {
  return { documentId: "doc-1", fileName: "report.pdf", mimeType, content: "Hello docling" };
}

describe("parseDoclingOutput", () => {
  it("returns the page list", () => {
    expect(parseDoclingOutput('{"pages":["a","b"],"page_count":2}')).toEqual(["a", "b"]);
  });

  it("returns null for invalid JSON or the wrong shape", () => {
    expect(parseDoclingOutput("not json")).toBeNull();
    expect(parseDoclingOutput('{"pages":[1]}')).toBeNull();
    expect(parseDoclingOutput('{"text":"a"}')).toBeNull();
  });
});

describe("DoclingTierClient", () => {
  const client = new DoclingTierClient({ pythonPath: process.execPath, scriptPath: FAKE_BRIDGE });

  it("supports office formats but not plain text", () => {
    expect(client.supports("application/pdf")).toBe(true);
    expect(
      client.supports("application/vnd.openxmlformats-officedocument.wordprocessingml.document"),
    ).toBe(true);
    expect(client.supports("text/plain")).toBe(false);
  });

  it("pipes the document through the bridge and cleans each page", async () => {
    const output = await client.extract(doc("application/pdf"), profile, new AbortController().signal);

    expect(output.pages).toEqual(["Hello docling", ""]);
    expect(output.costUsd).toBe(0);
    expect(output.model).toBe("docling");
  });

  it("reports a non-zero exit as tier unavailable", async () => {
    await expect(
      client.extract(doc("application/x-fail"), profile, new AbortController().signal),
    ).rejects.toMatchObject({
      code: "TIER_UNAVAILABLE",
      message: "Docling exited with code 3: converter crashed",
    });
  });

  it("reports malformed output as tier unavailable", async () => {
    await expect(
      client.extract(doc("application/x-garbage"), profile, new AbortController().signal),
    ).rejects.toMatchObject({ code: "TIER_UNAVAILABLE", message: "Docling returned malformed output" });
  });

  it("reports a missing interpreter as tier unavailable", async () => {
    const missing = new DoclingTierClient({ pythonPath: "/nonexistent/python-for-tests" });

    await expect(
      missing.extract(doc("application/pdf"), profile, new AbortController().signal),
    ).rejects.toMatchObject({ code: "TIER_UNAVAILABLE", tier: "fast" });
  });

  it("rejects with the abort reason when cancelled", async () => {
    const controller = new AbortController();
    controller.abort(new CancelledError());

    await expect(client.extract(doc("application/pdf"), profile, controller.signal)).rejects.toBeInstanceOf(
      CancelledError,
    );
  });
});
