import { spawn } from "node:child_process";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type {
  ExtractionDocument,
  IExtractionTierClient,
  TierOutput,
  TierProfile,
} from "@stratarag/types";
import { ExtractionEmptyError, TierUnavailableError } from "@stratarag/errors";
import { contentBytes } from "./content.js";
import { cleanExtractedText } from "./text-cleaner.js";

export const DOCLING_MIME_TYPES = [
  "application/pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
];

const DEFAULT_SCRIPT_PATH = fileURLToPath(
  new URL("../scripts/docling_extract.py", import.meta.url),
);

const doclingOutputSchema = z.object({
  pages: z.array(z.string()),
  page_count: z.number().int().nonnegative().optional(),
});

export function parseDoclingOutput(stdout: string): string[] | null {
  try {
    const parsed = doclingOutputSchema.safeParse(JSON.parse(stdout));
    return parsed.success ? parsed.data.pages : null;
  } catch {
    return null;
  }
}

export interface DoclingTierClientOptions {
  pythonPath?: string;
  scriptPath?: string;
}

/**
 * Python bridge to Docling for PDF/DOCX/PPTX extraction. The document goes in
 * on stdin; per-page markdown comes back as JSON on stdout.
 */
export class DoclingTierClient implements IExtractionTierClient {
  readonly tier = "fast";
  private pythonPath: string;
  private scriptPath: string;

  constructor(options?: DoclingTierClientOptions) {
    this.pythonPath = options?.pythonPath ?? "python3";
    this.scriptPath = options?.scriptPath ?? DEFAULT_SCRIPT_PATH;
  }

  supports(mimeType: string): boolean {
    return DOCLING_MIME_TYPES.includes(mimeType);
  }

  async extract(
    document: ExtractionDocument,
    profile: TierProfile,
    signal: AbortSignal,
  ): Promise<TierOutput> {
    const started = performance.now();
    const stdout = await this.run(document, signal);

    const rawPages = parseDoclingOutput(stdout);
    if (!rawPages) {
      throw new TierUnavailableError(this.tier, "Docling returned malformed output");
    }

    const pages = rawPages.map(cleanExtractedText);
    if (pages.every((page) => page.length === 0)) {
      throw new ExtractionEmptyError(this.tier, `Docling found no text in ${document.fileName}`);
    }

    return {
      pages,
      costUsd: pages.length * profile.costPerPageUsd,
      durationMs: performance.now() - started,
      model: "docling",
    };
  }

  private run(document: ExtractionDocument, signal: AbortSignal): Promise<string> {
    const input = contentBytes(document);

    return new Promise((resolve, reject) => {
      const child = spawn(
        this.pythonPath,
        [this.scriptPath, "--mime-type", document.mimeType, "--file-name", document.fileName],
        { signal },
      );

      let stdout = "";
      let stderr = "";

      child.stdout.on("data", (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      child.on("close", (code) => {
        if (signal.aborted) {
          return;
        }
        if (code !== 0) {
          reject(
            new TierUnavailableError(
              this.tier,
              `Docling exited with code ${String(code)}: ${stderr.slice(-500)}`,
            ),
          );
          return;
        }
        resolve(stdout);
      });

      child.on("error", (err) => {
        if (signal.aborted) {
          reject(signal.reason);
          return;
        }
        reject(
          new TierUnavailableError(this.tier, `Failed to spawn Docling process: ${err.message}`, {
            cause: err,
          }),
        );
      });

      // EPIPE if the process exits before reading stdin; the exit code is reported by 'close'
      child.stdin.on("error", (err) => {
        stderr += `stdin: ${err.message}\n`;
      });
      child.stdin.end(input);
    });
  }
}
