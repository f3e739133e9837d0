import { describe, it, expect } from "vitest";
import {
  cleanExtractedText,
  cleanMarkdownArtifacts,
  removeGlyphArtifacts,
  removeNoise,
} from "./text-cleaner.js";

describe("text cleaner", () => {
  it("removes GLYPH artifacts and collapses the gap they leave", () => {
    expect(removeGlyphArtifacts("Intro GLYPH<c=3,font=/AAA>  text")).toBe("Intro text");
    expect(removeGlyphArtifacts("a GLYPH&lt;12&gt; b")).toBe("a b");
  });

  it("strips control and zero-width characters", () => {
    expect(removeNoise("a\u200Bb\u0007c\uFEFF")).toBe("abc");
    expect(removeNoise("tab\tand\nnewline")).toBe("tab\tand\nnewline");
  });

  it("drops HTML comments, empty table rows, and extra blank lines", () => {
    expect(cleanMarkdownArtifacts("Intro\n\n\n\n<!-- image -->\n| |\nEnd")).toBe("Intro\n\nEnd");
  });

  it("keeps table rows that have content", () => {
    expect(cleanMarkdownArtifacts("| a | b |\n||\n| 1 | 2 |")).toBe("| a | b |\n| 1 | 2 |");
  });

  it("runs the full pipeline and trims", () => {
    expect(cleanExtractedText("  Intro GLYPH<c=3>  text\n\n\n\n<!-- x -->\nEnd  ")).toBe(
      "Intro text\n\nEnd",
    );
  });

  it("returns an empty string for whitespace-only input", () => {
    expect(cleanExtractedText(" \n\t ")).toBe("");
  });
});
