/**
 * Cleanup applied to text coming out of layout extraction and OCR.
 */

const GLYPH_PATTERNS = [/GLYPH<[^>]+>/g, /GLYPH&lt;[^&]+&gt;/g, /GLYPH\([^)]+\)/g];

// Control characters other than tab / newline / carriage return
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

// BOM, zero-width and bidi override characters
const INVISIBLE_CHARS = /[\uFEFF\u200B-\u200F\u202A-\u202E]/g;

const HTML_COMMENT = /<!--[\s\S]*?-->/g;

export function removeGlyphArtifacts(text: string): string {
  let result = text;
  for (const pattern of GLYPH_PATTERNS) {
    result = result.replace(pattern, "");
  }
  return result.replace(/[ \t]{2,}/g, " ");
}

export function removeNoise(text: string): string {
  return text.replace(CONTROL_CHARS, "").replace(INVISIBLE_CHARS, "");
}

/** True for table rows that carry no cell content, e.g. `| |` or `||`. */
function isEmptyTableRow(line: string): boolean {
  const stripped = line.trim();
  return stripped.length > 0 && stripped.length < 5 && /^[| ]+$/.test(stripped);
}

export function cleanMarkdownArtifacts(text: string): string {
  return text
    .replace(HTML_COMMENT, "")
    .split("\n")
    .filter((line) => !isEmptyTableRow(line))
    .join("\n")
    .replace(/\n{3,}/g, "\n\n");
}

export function cleanExtractedText(text: string): string {
  if (text.trim().length === 0) {
    return "";
  }
  return cleanMarkdownArtifacts(removeNoise(removeGlyphArtifacts(text))).trim();
}
