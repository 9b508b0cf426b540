import type { RuleDefinition, SEORecord, RuleContext, RuleCheckResult } from "../types.js";

export const MIN_WORD_COUNT = 300;
export const MAX_PARAGRAPH_LENGTH = 160;
/** Ideal keyword density range, in percent */
export const KEYWORD_DENSITY_RANGE = { min: 1.0, max: 2.5 } as const;
/** Share of paragraphs that should mention the keyword */
export const MIN_KEYWORD_COVERAGE = 0.3;
/** One recommended keyword occurrence per this many words */
export const WORDS_PER_KEYWORD = 300;
/** Flesch reading ease below this reads as difficult */
export const MIN_READABILITY_SCORE = 60;

export const contentLengthRule: RuleDefinition = {
  id: "content-length",
  name: "Content Length",
  group: "content",
  description: "Page should have at least 300 words of text content",
  weight: 7,
  check(record: SEORecord): RuleCheckResult {
    const words = record.wordCount;

    if (words >= MIN_WORD_COUNT) {
      return { status: "pass" };
    }

    return {
      status: "fail",
      deduction: words < MIN_WORD_COUNT / 2 ? 7 : 4,
      message: `Thin content: only ${words} words. Expand the page to at least ${MIN_WORD_COUNT} words of useful text.`,
    };
  },
};

/** Share of words that are the target keyword, in percent. 0 without a keyword or words. */
export function keywordDensityPercent(record: SEORecord): number {
  if (!record.keyword || record.wordCount === 0) return 0;
  return (record.keywordCount / record.wordCount) * 100;
}

function formatDensity(density: number): string {
  return density > 0 && density < 0.01 ? "<0.01" : density.toFixed(2);
}

export const keywordDensityRule: RuleDefinition = {
  id: "keyword-density",
  name: "Keyword Density",
  group: "content",
  description: "Target keyword should make up 1-2.5% of the words on the page",
  weight: 6,
  check(record: SEORecord, { metrics }: RuleContext): RuleCheckResult {
    // No target keyword, nothing to measure against
    if (!record.keyword) {
      return { status: "pass" };
    }

    const { min, max } = KEYWORD_DENSITY_RANGE;

    if (record.wordCount === 0) {
      return {
        status: "fail",
        deduction: 6,
        message: `Keyword density cannot be measured: the page has no counted words. Add text that uses "${record.keyword}" naturally.`,
      };
    }

    // Decide on the unrounded ratio; metrics only carry a display value
    const density = keywordDensityPercent(record);

    if (density >= min && density <= max) {
      return { status: "pass" };
    }

    if (density === 0) {
      return {
        status: "fail",
        deduction: 6,
        message: `Keyword "${record.keyword}" does not appear in the content. Use it about ${metrics.recommendedKeywordCount} time(s) to reach ${min}-${max}% density.`,
      };
    }

    if (density < min) {
      return {
        status: "fail",
        deduction: 3,
        message: `Keyword density too low (${formatDensity(density)}%). Use "${record.keyword}" about ${metrics.recommendedKeywordCount} time(s) to reach ${min}-${max}%.`,
      };
    }

    return {
      status: "fail",
      deduction: 6,
      message: `Keyword density too high (${formatDensity(density)}%). Use "${record.keyword}" less often to avoid keyword stuffing; aim for ${min}-${max}%.`,
    };
  },
};

export const keywordCountRule: RuleDefinition = {
  id: "keyword-count",
  name: "Keyword Count",
  group: "content",
  description: "Target keyword should appear about once per 300 words",
  weight: 1,
  check(record: SEORecord, { metrics }: RuleContext): RuleCheckResult {
    const recommended = metrics.recommendedKeywordCount;
    if (!record.keyword || record.keywordCount >= recommended) {
      return { status: "pass" };
    }

    return {
      status: "fail",
      deduction: 1,
      message: `Keyword "${record.keyword}" appears ${record.keywordCount} time(s). Use it about ${recommended} time(s), once per ${WORDS_PER_KEYWORD} words.`,
    };
  },
};

export const keywordDistributionRule: RuleDefinition = {
  id: "keyword-distribution",
  name: "Keyword Distribution",
  group: "content",
  description: "Target keyword should appear in at least 30% of paragraphs",
  weight: 2,
  check(record: SEORecord, { metrics }: RuleContext): RuleCheckResult {
    const total = record.paragraphs.length;
    if (!record.keyword || total === 0) {
      return { status: "pass" };
    }

    if (metrics.keywordParagraphCoverage >= MIN_KEYWORD_COVERAGE) {
      return { status: "pass" };
    }

    return {
      status: "fail",
      deduction: 2,
      message: `Keyword "${record.keyword}" appears in only ${metrics.keywordParagraphCount} of ${total} paragraphs. Distribute it more evenly across the content.`,
    };
  },
};

export const paragraphLengthRule: RuleDefinition = {
  id: "paragraph-length",
  name: "Paragraph Length",
  group: "content",
  description: "Paragraphs should stay under 160 characters for readability",
  weight: 3,
  check(record: SEORecord, { metrics }: RuleContext): RuleCheckResult {
    const total = record.paragraphs.length;
    const long = metrics.longParagraphCount;

    if (long === 0) {
      return { status: "pass" };
    }

    return {
      status: "fail",
      deduction: Math.max(1, Math.round((3 * long) / total)),
      message: `${long} of ${total} paragraphs exceed ${MAX_PARAGRAPH_LENGTH} characters. Split long paragraphs to keep them readable.`,
    };
  },
};

export const readabilityRule: RuleDefinition = {
  id: "readability",
  name: "Readability",
  group: "content",
  description: "Content should score at least 60 on the Flesch reading ease scale",
  weight: 1,
  check(record: SEORecord): RuleCheckResult {
    const score = record.readabilityScore;
    // Not measured
    if (score === null || score >= MIN_READABILITY_SCORE) {
      return { status: "pass" };
    }

    return {
      status: "fail",
      deduction: 1,
      message: `Content may be difficult to read (reading ease ${score}). Use shorter sentences and plainer words to reach ${MIN_READABILITY_SCORE} or more.`,
    };
  },
};
