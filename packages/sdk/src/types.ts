// ============================================================================
// pagehealth: type definitions
// ============================================================================

// --------------------------------------------------------------------------
// Audit record (input)
// --------------------------------------------------------------------------

/** A paragraph as collected from the page body. */
export interface Paragraph {
  /** Character length of the paragraph text */
  length: number;
  text: string;
}

/**
 * Raw audit input as handed over by a collector (crawler, API client, JSON file).
 * Only `url` is required; everything else falls back to RECORD_DEFAULTS.
 */
export interface SEORecordInput {
  url: string;

  // Content
  title?: string | null;
  metaDescription?: string | null;
  wordCount?: number;
  keyword?: string | null;
  keywordCount?: number;
  h1Text?: string | null;
  /** Number of H1 elements on the page. Inferred from h1Text when absent. */
  h1Count?: number;
  h2Texts?: string[];
  /** Number of H2 elements. Defaults to the length of h2Texts. */
  h2Count?: number;
  /** Number of H3 elements. `null` when not counted. */
  h3Count?: number | null;
  /** `length` may be omitted, it is then taken from `text` */
  paragraphs?: Array<{ text: string; length?: number }>;
  /** Flesch reading ease (higher is easier). `null` when not measured. */
  readabilityScore?: number | null;

  // Media
  imagesCount?: number;
  missingAltImagesCount?: number;

  // Technical
  hasCanonical?: boolean;
  hasSchemaMarkup?: boolean;
  schemaTypes?: string[] | ReadonlySet<string>;
  robotsTxtPresent?: boolean;
  sitemapPresent?: boolean;
  renderBlockingResourcesCount?: number;
  lazyLoadingEnabled?: boolean;
  /** Inferred from the URL scheme when absent */
  https?: boolean;

  // Core Web Vitals
  /** LCP in milliseconds */
  largestContentfulPaint?: number | null;
  /** FID in milliseconds */
  firstInputDelay?: number | null;
  cumulativeLayoutShift?: number | null;
  mobileFriendly?: boolean;

  // E-E-A-T
  authorCredentials?: boolean;
  contactInfoPresent?: boolean;
  lastUpdated?: Date | string | null;
  duplicateContentFlag?: boolean;
  thinContentFlag?: boolean;
}

/** A fully resolved audit record. Produced by defineRecord(), consumed by evaluate(). */
export interface SEORecord {
  readonly url: string;

  readonly title: string | null;
  readonly metaDescription: string | null;
  readonly wordCount: number;
  readonly keyword: string | null;
  readonly keywordCount: number;
  readonly h1Text: string | null;
  readonly h1Count: number;
  readonly h2Texts: readonly string[];
  readonly h2Count: number;
  readonly h3Count: number | null;
  readonly paragraphs: readonly Paragraph[];
  readonly readabilityScore: number | null;

  readonly imagesCount: number;
  readonly missingAltImagesCount: number;

  readonly hasCanonical: boolean;
  readonly hasSchemaMarkup: boolean;
  readonly schemaTypes: ReadonlySet<string>;
  readonly robotsTxtPresent: boolean;
  readonly sitemapPresent: boolean;
  readonly renderBlockingResourcesCount: number;
  readonly lazyLoadingEnabled: boolean;
  readonly https: boolean;

  readonly largestContentfulPaint: number | null;
  readonly firstInputDelay: number | null;
  readonly cumulativeLayoutShift: number | null;
  readonly mobileFriendly: boolean;

  readonly authorCredentials: boolean;
  readonly contactInfoPresent: boolean;
  readonly lastUpdated: Date | null;
  readonly duplicateContentFlag: boolean;
  readonly thinContentFlag: boolean;
}

// --------------------------------------------------------------------------
// Evaluation (output)
// --------------------------------------------------------------------------

/** The six check groups, in evaluation order */
export type RuleGroup = "content" | "meta" | "technical" | "media" | "vitals" | "eeat";

/** Rule severity. Critical findings set hasCriticalErrors regardless of score */
export type RuleSeverity = "critical" | "optional";

export type Grade = "A" | "B" | "C" | "D" | "F";

/** A rule that fired: one deduction, one recommendation */
export interface Finding {
  ruleId: string;
  group: RuleGroup;
  severity: RuleSeverity;
  /** Points taken off the 100 baseline */
  deduction: number;
  /** Human-readable problem + fix */
  message: string;
}

export interface GroupBreakdown {
  /** Maximum points the group can take off */
  weight: number;
  deduction: number;
  /** weight - deduction */
  score: number;
}

/** Values computed from the record along the way */
export interface RecordMetrics {
  titleLength: number;
  metaDescriptionLength: number;
  /** Percentage, rounded to two decimals */
  keywordDensity: number;
  /** One occurrence per 300 words */
  recommendedKeywordCount: number;
  longParagraphCount: number;
  /** Paragraphs that contain the keyword (case-insensitive) */
  keywordParagraphCount: number;
  /** keywordParagraphCount / paragraphs, rounded to two decimals */
  keywordParagraphCoverage: number;
}

/** Result of evaluate() */
export interface EvaluationResult {
  /** Overall score from 0 to 100 */
  healthPercentage: number;
  /** Letter grade based on score */
  grade: Grade;
  /** Ordered by priority: critical first, then biggest deduction */
  recommendations: string[];
  hasCriticalErrors: boolean;
  /** Structured form of `recommendations`, same order */
  findings: Finding[];
  breakdown: Record<RuleGroup, GroupBreakdown>;
  metrics: RecordMetrics;
}

/** Options for evaluate() */
export interface EvaluateOptions {
  /** Reference time for the content freshness check. Defaults to the current time. */
  now?: Date;
  /** Rule IDs to skip (deduct nothing, recommend nothing) */
  disabledRules?: string[];
}

// --------------------------------------------------------------------------
// Internal: Rule definition (used by rule modules)
// --------------------------------------------------------------------------

/** What a rule's check function returns. A pass carries no deduction. */
export type RuleCheckResult =
  | { status: "pass" }
  | {
      status: "fail";
      deduction: number;
      message: string;
      /** Overrides the rule's severity for this outcome */
      severity?: RuleSeverity;
    };

/** Shared, precomputed values handed to every rule */
export interface RuleContext {
  now: Date;
  metrics: RecordMetrics;
}

/** Definition of a scoring rule used internally by rule modules */
export interface RuleDefinition {
  id: string;
  name: string;
  group: RuleGroup;
  description: string;
  /** Maximum deduction (out of 100 total) */
  weight: number;
  /** Defaults to "optional". */
  severity?: RuleSeverity;
  check: (record: SEORecord, context: RuleContext) => RuleCheckResult;
}
