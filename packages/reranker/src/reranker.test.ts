import { describe, it, expect, vi } from "vitest";
import { CohereClient, CohereError } from "cohere-ai";
import { ExternalServiceError, RateLimitedError, ValidationError } from "@stratarag/errors";
import { CohereRerankScorer } from "./cohere-scorer.js";
import { HttpCrossEncoderScorer } from "./http-cross-encoder.js";
import { createRerankScorer } from "./factory.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("CohereRerankScorer", () => {
  function makeClient(rerank: ReturnType<typeof vi.fn>): CohereClient {
    const client = new CohereClient({ token: "test-secret" });
    vi.spyOn(client.v2, "rerank").mockImplementation(rerank);
    return client;
  }

  it("returns scores in input order", async () => {
    const rerank = vi.fn().mockResolvedValue({
      results: [
        { index: 2, relevanceScore: 0.9 },
        { index: 0, relevanceScore: 0.5 },
        { index: 1, relevanceScore: 0.1 },
      ],
    });
    const scorer = new CohereRerankScorer({ apiKey: "test-secret", client: makeClient(rerank) });

    const scores = await scorer.score("query", ["a", "b", "c"]);

    expect(scores).toEqual([0.5, 0.1, 0.9]);
    expect(rerank.mock.calls[0]?.[0]).toEqual({
      model: "rerank-v3.5",
      query: "query",
      documents: ["a", "b", "c"],
      topN: 3,
    });
  });

  it("skips the call for an empty batch", async () => {
    const rerank = vi.fn();
    const scorer = new CohereRerankScorer({ apiKey: "test-secret", client: makeClient(rerank) });

    expect(await scorer.score("query", [])).toEqual([]);
    expect(rerank).not.toHaveBeenCalled();
  });

  it("fails when a document is missing from the results", async () => {
    const rerank = vi.fn().mockResolvedValue({ results: [{ index: 0, relevanceScore: 0.5 }] });
    const scorer = new CohereRerankScorer({ apiKey: "test-secret", client: makeClient(rerank) });

    await expect(scorer.score("query", ["a", "b"])).rejects.toBeInstanceOf(ExternalServiceError);
  });

  it("maps SDK rate limits", async () => {
    const rerank = vi.fn().mockRejectedValue(new CohereError({ statusCode: 429 }));
    const scorer = new CohereRerankScorer({ apiKey: "test-secret", client: makeClient(rerank) });

    await expect(scorer.score("query", ["a"])).rejects.toBeInstanceOf(RateLimitedError);
  });
});

describe("HttpCrossEncoderScorer", () => {
  it("posts query and texts to /rerank", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ scores: [0.2, 0.8] }));
    const scorer = new HttpCrossEncoderScorer({ baseUrl: "http://rerank.local/", fetch: fetchMock });

    const scores = await scorer.score("q", ["a", "b"]);

    expect(scores).toEqual([0.2, 0.8]);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://rerank.local/rerank");
    expect(JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body))).toEqual({ query: "q", texts: ["a", "b"] });
  });

  it("rejects a score count that does not match the input", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ scores: [0.2] }));
    const scorer = new HttpCrossEncoderScorer({ baseUrl: "http://rerank.local", fetch: fetchMock });

    await expect(scorer.score("q", ["a", "b"])).rejects.toThrow("Cross-encoder returned a malformed response");
  });

  it("maps 429 to RateLimitedError", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({}, 429));
    const scorer = new HttpCrossEncoderScorer({ baseUrl: "http://rerank.local", fetch: fetchMock });

    await expect(scorer.score("q", ["a"])).rejects.toBeInstanceOf(RateLimitedError);
  });
});

describe("createRerankScorer", () => {
  const base = { cohereModel: "rerank-v3.5" };

  it("returns undefined when disabled", () => {
    expect(createRerankScorer({ ...base, provider: "none" })).toBeUndefined();
  });

  it("builds the configured scorer", () => {
    expect(createRerankScorer({ ...base, provider: "cohere", cohereApiKey: "test-secret" })?.name).toBe(
      "cohere",
    );
    expect(
      createRerankScorer({ ...base, provider: "cross-encoder", crossEncoderUrl: "http://rerank.local" })?.name,
    ).toBe("cross-encoder");
  });

  it("requires credentials for the chosen provider", () => {
    expect(() => createRerankScorer({ ...base, provider: "cohere" })).toThrow(ValidationError);
  });
});
