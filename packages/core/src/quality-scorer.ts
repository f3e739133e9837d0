import { QUALITY_DIMENSIONS } from "@stratarag/types";
import type {
  DimensionReport,
  QualityDimension,
  QualityRecommendation,
  QualityReport,
  QualityWeights,
} from "@stratarag/types";
import { ValidationError } from "@stratarag/errors";

export const DEFAULT_QUALITY_WEIGHTS: Readonly<QualityWeights> = Object.freeze({
  cleanliness: 0.25,
  wordIntegrity: 0.2,
  consistency: 0.15,
  structure: 0.2,
  density: 0.2,
});

/** 20% corrupted characters floors cleanliness at 0. */
const CORRUPTION_PENALTY = 5;
const WORD_LENGTH_MIN = 3;
const WORD_LENGTH_MAX = 8;
const GLUED_WORD_LENGTH = 25;
const GLUED_PENALTY = 10;
const HIGH_VARIATION_CV = 0.75;
const STRUCTURE_SATURATION = 0.1;
const DENSITY_CHAR_FLOOR = 500;
const DENSITY_WORD_FLOOR = 80;
const WEIGHT_TOLERANCE = 1e-6;

// Replacement char, C0 controls other than \t \n \r, DEL, C1 controls, private use area
const BAD_CHARS = /[\uFFFD\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F\uE000-\uF8FF]/g;
const HEADER_LINE = /^#{1,6}\s+\S/;
const LIST_LINE = /^(?:[-*+•]|\d+[.)])\s+\S/;
const TABLE_LINE = /^\|.*\|$/;

type DimensionScore = Omit<DimensionReport, "weight">;

interface PageStats {
  pages: readonly string[];
  text: string;
  words: string[];
  chars: number;
}

function mapDimensions(
  build: (dimension: QualityDimension) => DimensionReport,
): Record<QualityDimension, DimensionReport> {
  return {
    cleanliness: build("cleanliness"),
    wordIntegrity: build("wordIntegrity"),
    consistency: build("consistency"),
    structure: build("structure"),
    density: build("density"),
  };
}

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

const fmt = (value: number): string => value.toFixed(2);

export function recommendationFor(score: number): QualityRecommendation {
  if (score >= 0.85) return "excellent";
  if (score >= 0.7) return "good";
  if (score >= 0.5) return "fair";
  return "poor";
}

export function validateWeights(weights: QualityWeights): void {
  const fields: Record<string, string> = {};
  for (const dimension of QUALITY_DIMENSIONS) {
    const weight = weights[dimension];
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
      fields[dimension] = "must be between 0 and 1";
    }
  }
  const total = QUALITY_DIMENSIONS.reduce((sum, d) => sum + weights[d], 0);
  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    fields["weights"] = `must sum to 1.0, got ${String(total)}`;
  }
  if (Object.keys(fields).length > 0) {
    throw new ValidationError("Invalid quality weights", fields);
  }
}

function cleanliness({ text, chars }: PageStats): DimensionScore {
  const bad = text.match(BAD_CHARS)?.length ?? 0;
  const ratio = bad / chars;
  const score = 1 - Math.min(1, ratio * CORRUPTION_PENALTY);
  const issues = bad > 0 ? [`${String(bad)} corrupted or control characters (${fmt(ratio * 100)}%)`] : [];
  return { score, signals: { badChars: bad, badCharRatio: ratio }, issues };
}

function wordIntegrity({ words }: PageStats): DimensionScore {
  if (words.length === 0) {
    return { score: 0, signals: { words: 0 }, issues: ["No words found"] };
  }

  const avgLength = words.reduce((sum, w) => sum + w.length, 0) / words.length;
  let deviation = 0;
  if (avgLength < WORD_LENGTH_MIN) {
    deviation = (WORD_LENGTH_MIN - avgLength) / WORD_LENGTH_MIN;
  } else if (avgLength > WORD_LENGTH_MAX) {
    deviation = (avgLength - WORD_LENGTH_MAX) / WORD_LENGTH_MAX;
  }
  const lengthScore = 1 - Math.min(1, deviation);

  const longWords = words.filter((w) => w.length > GLUED_WORD_LENGTH).length;
  const longRatio = longWords / words.length;
  const longScore = 1 - Math.min(1, longRatio * GLUED_PENALTY);

  const issues: string[] = [];
  if (deviation > 0) {
    issues.push(`Average word length ${fmt(avgLength)} is outside ${String(WORD_LENGTH_MIN)}-${String(WORD_LENGTH_MAX)}`);
  }
  if (longWords > 0) {
    issues.push(`${String(longWords)} words longer than ${String(GLUED_WORD_LENGTH)} characters`);
  }

  return {
    score: 0.6 * lengthScore + 0.4 * longScore,
    signals: { avgWordLength: avgLength, longWordRatio: longRatio, lengthScore, longScore },
    issues,
  };
}

function consistency({ pages }: PageStats): DimensionScore {
  const lengths = pages.map((p) => p.trim().length);
  const mean = lengths.reduce((sum, l) => sum + l, 0) / lengths.length;
  const emptyPages = lengths.filter((l) => l === 0).length;
  const emptyRatio = emptyPages / lengths.length;

  const variance = lengths.reduce((sum, l) => sum + (l - mean) ** 2, 0) / lengths.length;
  const cv = mean > 0 ? Math.sqrt(variance) / mean : 0;
  const score = mean > 0 ? clamp01(1 - cv) : 0;

  const issues: string[] = [];
  if (cv > HIGH_VARIATION_CV) {
    issues.push(`Page lengths vary widely (cv ${fmt(cv)})`);
  }
  if (emptyPages > 0) {
    issues.push(`${String(emptyPages)} of ${String(lengths.length)} pages are empty`);
  }

  return { score, signals: { cv, meanPageLength: mean, emptyPageRatio: emptyRatio }, issues };
}

function structure({ text }: PageStats): DimensionScore {
  const lines = text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  let headers = 0;
  let lists = 0;
  let tables = 0;
  for (const line of lines) {
    if (HEADER_LINE.test(line)) headers++;
    else if (LIST_LINE.test(line)) lists++;
    else if (TABLE_LINE.test(line)) tables++;
  }

  const weighted = headers + 0.5 * (lists + tables);
  const score = lines.length > 0 ? Math.min(1, weighted / lines.length / STRUCTURE_SATURATION) : 0;
  const issues = weighted === 0 ? ["No headers, lists or tables found"] : [];

  return { score, signals: { lines: lines.length, headers, lists, tables }, issues };
}

function density({ pages, chars, words }: PageStats): DimensionScore {
  const avgChars = chars / pages.length;
  const avgWords = words.length / pages.length;
  const score =
    0.5 * Math.min(1, avgChars / DENSITY_CHAR_FLOOR) + 0.5 * Math.min(1, avgWords / DENSITY_WORD_FLOOR);
  const issues =
    avgChars < DENSITY_CHAR_FLOOR ? [`Only ${fmt(avgChars)} characters per page`] : [];
  return { score, signals: { avgCharsPerPage: avgChars, avgWordsPerPage: avgWords }, issues };
}

const SCORERS: Record<QualityDimension, (stats: PageStats) => DimensionScore> = {
  cleanliness,
  wordIntegrity,
  consistency,
  structure,
  density,
};

/**
 * Scores extracted pages with no ground truth. Pure: the same pages always
 * produce the same report.
 */
export class QualityScorer {
  readonly weights: Readonly<QualityWeights>;

  constructor(weights: QualityWeights = DEFAULT_QUALITY_WEIGHTS) {
    validateWeights(weights);
    this.weights = Object.freeze({ ...weights });
  }

  score(pages: readonly string[]): QualityReport {
    const text = pages.join("\n");
    const stats: PageStats = {
      pages,
      text,
      words: text.split(/\s+/).filter((w) => w.length > 0),
      chars: pages.reduce((sum, p) => sum + p.length, 0),
    };

    if (pages.length === 0 || stats.text.trim().length === 0) {
      return this.emptyReport(pages.length === 0 ? "No pages extracted" : "No text extracted", stats);
    }

    const dimensions = mapDimensions((dimension) => {
      const result = SCORERS[dimension](stats);
      return { ...result, score: clamp01(result.score), weight: this.weights[dimension] };
    });

    let overall = 0;
    const issues: string[] = [];
    for (const dimension of QUALITY_DIMENSIONS) {
      overall += dimensions[dimension].score * dimensions[dimension].weight;
      issues.push(...dimensions[dimension].issues);
    }

    const overallScore = clamp01(overall);
    return {
      overallScore,
      recommendation: recommendationFor(overallScore),
      dimensions,
      issues,
      stats: { pages: pages.length, chars: stats.chars, words: stats.words.length },
    };
  }

  private emptyReport(issue: string, stats: PageStats): QualityReport {
    const dimensions = mapDimensions((dimension) => ({
      score: 0,
      weight: this.weights[dimension],
      signals: {},
      issues: [],
    }));
    return {
      overallScore: 0,
      recommendation: "poor",
      dimensions,
      issues: [issue],
      stats: { pages: stats.pages.length, chars: stats.chars, words: 0 },
    };
  }
}
