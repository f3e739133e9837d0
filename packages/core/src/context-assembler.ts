import type { ChunkSource, SearchHit, SourceSummaryEntry, TargetModel } from "@stratarag/types";

type ContextHit = Pick<SearchHit, "text" | "source">;

function attributionParts(source: ChunkSource): string[] {
  const parts = [source.sourceFile];
  if (source.page !== undefined) parts.push(`Page ${String(source.page)}`);
  if (source.section) parts.push(`Section ${source.section}`);
  return parts;
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/"/g, "&quot;").replace(/</g, "&lt;");
}

/**
 * Model-agnostic context formatting.
 * Assembles retrieved chunks into a format optimized for the target model.
 *
 * - XML (Claude): Uses XML tags for structured context
 * - Markdown (GPT): Uses markdown formatting
 * - Plain (Gemini/Generic): Simple numbered sections
 */
export function assembleContext(hits: readonly ContextHit[], targetModel: TargetModel = "generic"): string {
  if (hits.length === 0) return "";

  switch (targetModel) {
    case "claude":
      return assembleXml(hits);
    case "gpt":
      return assembleMarkdown(hits);
    case "gemini":
    case "generic":
      return assemblePlain(hits);
  }
}

function assembleXml(hits: readonly ContextHit[]): string {
  const parts = hits.map(({ text, source }, i) => {
    const attributes = [`index="${String(i + 1)}"`, `source="${escapeAttribute(source.sourceFile)}"`];
    if (source.page !== undefined) attributes.push(`page="${String(source.page)}"`);
    if (source.section) attributes.push(`section="${escapeAttribute(source.section)}"`);
    return `<document ${attributes.join(" ")}>\n${text}\n</document>`;
  });

  return `<context>\n${parts.join("\n")}\n</context>`;
}

function assembleMarkdown(hits: readonly ContextHit[]): string {
  const parts = hits.map(
    ({ text, source }, i) =>
      `### Source ${String(i + 1)} (${attributionParts(source).join(", ")})\n\n${text}`,
  );

  return `## Retrieved Context\n\n${parts.join("\n\n---\n\n")}`;
}

function assemblePlain(hits: readonly ContextHit[]): string {
  const parts = hits.map(
    ({ text, source }, i) => `[${String(i + 1)}] (Source: ${attributionParts(source).join(", ")})\n${text}`,
  );

  return parts.join("\n\n");
}

/** Chunk counts per source file, in order of first appearance. */
export function summarizeSources(hits: readonly ContextHit[]): SourceSummaryEntry[] {
  const counts = new Map<string, number>();
  for (const { source } of hits) {
    counts.set(source.sourceFile, (counts.get(source.sourceFile) ?? 0) + 1);
  }
  return [...counts].map(([sourceFile, chunkCount]) => ({ sourceFile, chunkCount }));
}
