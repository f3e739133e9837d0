import { z } from "zod";
import type { DocumentMetadata, IMetadataExtractor } from "@stratarag/types";
import { CancelledError } from "@stratarag/errors";
import type { Logger } from "@stratarag/logger";
import type { ILlmGateway } from "./llm-gateway.interface.js";

export const METADATA_SAMPLE_CHARS = 3000;

const METADATA_SYSTEM_PROMPT = [
  "You classify documents. Reply with one JSON object and nothing else, with these string fields:",
  'docType ("law", "regulation", "guideline", "policy", "report" or "other"),',
  'category (for example "contracts", "hr", "finance" or "general"),',
  'status ("active", "draft", "archived" or "unknown"),',
  'title (taken from the text, or "Untitled").',
].join(" ");

const metadataSchema = z.object({
  docType: z.string().min(1),
  category: z.string().min(1),
  status: z.string().min(1),
  title: z.string().min(1),
});

const CATEGORY_KEYWORDS: ReadonlyArray<[string, readonly string[]]> = [
  ["contracts", ["contract", "agreement"]],
  ["hr", ["employee", "human resource", "leave policy", "payroll"]],
  ["finance", ["finance", "budget", "invoice"]],
];

const DOC_TYPE_KEYWORDS: ReadonlyArray<[string, readonly string[]]> = [
  ["law", ["act of", " law "]],
  ["regulation", ["regulation"]],
  ["guideline", ["guideline"]],
  ["policy", ["policy"]],
  ["report", ["report"]],
];

function firstMatch(text: string, table: ReadonlyArray<[string, readonly string[]]>, fallback: string): string {
  for (const [label, words] of table) {
    if (words.some((word) => text.includes(word))) {
      return label;
    }
  }
  return fallback;
}

/** Keyword guess used when no model answer is available. */
export function heuristicMetadata(text: string): DocumentMetadata {
  const firstLine = (text.split("\n").find((line) => line.trim().length > 0) ?? "").trim();
  const title = firstLine.replace(/^#+\s*/, "").slice(0, 100) || "Untitled";
  const lower = ` ${text.toLowerCase()} `;
  return {
    docType: firstMatch(lower, DOC_TYPE_KEYWORDS, "other"),
    category: firstMatch(lower, CATEGORY_KEYWORDS, "general"),
    status: "unknown",
    title,
  };
}

/**
 * Pulls the JSON object out of a model reply: bare, inside a ```json fence,
 * or between the first "{" and the last "}". Null when none of them parse.
 */
export function parseMetadataReply(reply: string): DocumentMetadata | null {
  const candidates = [reply.trim()];
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(reply);
  if (fenced?.[1]) {
    candidates.push(fenced[1].trim());
  }
  const open = reply.indexOf("{");
  const close = reply.lastIndexOf("}");
  if (open !== -1 && close > open) {
    candidates.push(reply.slice(open, close + 1));
  }

  for (const candidate of candidates) {
    let value: unknown;
    try {
      value = JSON.parse(candidate);
    } catch {
      continue;
    }
    const parsed = metadataSchema.safeParse(value);
    if (parsed.success) {
      return parsed.data;
    }
  }
  return null;
}

/**
 * Asks the chat model to classify the opening of a document. Model failures
 * and unreadable replies fall back to `heuristicMetadata`; cancellation does not.
 */
export class LlmMetadataExtractor implements IMetadataExtractor {
  constructor(
    private readonly llm: ILlmGateway,
    private readonly logger?: Logger,
    private readonly sampleChars: number = METADATA_SAMPLE_CHARS,
  ) {}

  async extract(text: string, signal?: AbortSignal): Promise<DocumentMetadata> {
    const sample = text.length > this.sampleChars ? `${text.slice(0, this.sampleChars)}...` : text;

    let reply: string;
    try {
      const response = await this.llm.generate(
        { system: METADATA_SYSTEM_PROMPT, messages: [{ role: "user", content: sample }], temperature: 0 },
        signal,
      );
      reply = response.text;
    } catch (error: unknown) {
      if (error instanceof CancelledError || signal?.aborted) {
        throw error;
      }
      this.logger?.warn({ err: error, llm: this.llm.name }, "metadata extraction failed, using keyword guess");
      return heuristicMetadata(text);
    }

    const parsed = parseMetadataReply(reply);
    if (!parsed) {
      this.logger?.warn({ llm: this.llm.name }, "metadata reply was not JSON, using keyword guess");
      return heuristicMetadata(text);
    }
    return parsed;
  }
}
