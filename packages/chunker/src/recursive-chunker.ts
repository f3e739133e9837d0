import type { ChunkResult, ChunkingConfig } from "@stratarag/types";
import type { IChunker } from "./chunker.interface.js";

export const DEFAULT_SEPARATORS = ["\n\n", "\n", ". ", " ", ""];

/** Half-open character range into the source text. */
interface Span {
  start: number;
  end: number;
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Split `text` on `separator`, keeping the separator on the end of the part
 * before it so the parts tile the text without gaps.
 */
function splitKeepingSeparator(text: string, separator: string): string[] {
  const parts: string[] = [];
  let pos = 0;
  while (pos < text.length) {
    const idx = text.indexOf(separator, pos);
    if (idx === -1) {
      parts.push(text.slice(pos));
      break;
    }
    parts.push(text.slice(pos, idx + separator.length));
    pos = idx + separator.length;
  }
  return parts;
}

/**
 * Recursive splitting with separator hierarchy.
 * Tries larger separators first, falling back to smaller ones, then merges the
 * pieces back into chunks of at most `chunkSize` characters that share up to
 * `overlap` characters with their predecessor.
 */
export class RecursiveChunker implements IChunker {
  readonly strategy = "recursive";
  private separators: string[];

  constructor(separators?: string[]) {
    this.separators = separators ?? DEFAULT_SEPARATORS;
  }

  chunk(content: string, config: ChunkingConfig): ChunkResult[] {
    return this.chunkRange(content, 0, content.length, config).map((chunk, index) => ({
      ...chunk,
      index,
    }));
  }

  /**
   * Chunk `source.slice(start, end)`, reporting offsets relative to `source`.
   * Indices are left at 0 for the caller to assign.
   */
  chunkRange(source: string, start: number, end: number, config: ChunkingConfig): ChunkResult[] {
    const chunkSize = Math.max(1, config.chunkSize);
    const overlap = Math.min(Math.max(0, config.overlap), chunkSize - 1);
    const pieces = this.splitRecursive(source.slice(start, end), start, chunkSize, 0);
    return this.merge(source, pieces, chunkSize, overlap);
  }

  private splitRecursive(
    text: string,
    offset: number,
    chunkSize: number,
    separatorIndex: number,
  ): Span[] {
    if (text.length <= chunkSize) {
      return text.length > 0 ? [{ start: offset, end: offset + text.length }] : [];
    }

    const separator = this.separators[separatorIndex];
    if (separator === undefined || separator === "") {
      // Hard cut at chunkSize chars
      const spans: Span[] = [];
      for (let i = 0; i < text.length; i += chunkSize) {
        spans.push({ start: offset + i, end: offset + Math.min(text.length, i + chunkSize) });
      }
      return spans;
    }

    const spans: Span[] = [];
    let pos = offset;
    for (const part of splitKeepingSeparator(text, separator)) {
      if (part.length <= chunkSize) {
        spans.push({ start: pos, end: pos + part.length });
      } else {
        spans.push(...this.splitRecursive(part, pos, chunkSize, separatorIndex + 1));
      }
      pos += part.length;
    }
    return spans;
  }

  private merge(source: string, pieces: Span[], chunkSize: number, overlap: number): ChunkResult[] {
    const results: ChunkResult[] = [];
    let current: Span[] = [];

    const emit = (): void => {
      const first = current[0];
      const last = current[current.length - 1];
      if (!first || !last) {
        return;
      }
      const raw = source.slice(first.start, last.end);
      const content = raw.trim();
      if (content.length === 0) {
        return;
      }
      const startChar = first.start + (raw.length - raw.trimStart().length);
      results.push({
        content,
        index: 0,
        tokenCount: estimateTokens(content),
        metadata: { startChar, endChar: startChar + content.length },
      });
    };

    for (const piece of pieces) {
      const head = current[0];
      if (head && piece.end - head.start > chunkSize) {
        emit();
        // Keep a tail of the emitted chunk as overlap, as long as the next piece still fits
        while (current.length > 0) {
          const first = current[0];
          const last = current[current.length - 1];
          if (!first || !last) {
            break;
          }
          if (last.end - first.start <= overlap && piece.end - first.start <= chunkSize) {
            break;
          }
          current.shift();
        }
      }
      current.push(piece);
    }
    emit();

    return results;
  }
}
