import type { ExtractionDocument } from "@stratarag/types";

export function contentBytes(document: ExtractionDocument): Buffer {
  return typeof document.content === "string"
    ? Buffer.from(document.content, "utf8")
    : Buffer.from(document.content);
}
