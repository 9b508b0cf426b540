import { z } from "zod";
import type { Paragraph, SEORecord, SEORecordInput } from "./types.js";
import { RecordValidationError } from "./errors.js";

type DefaultedField = Exclude<
  keyof SEORecord,
  "url" | "h1Count" | "h2Count" | "hasSchemaMarkup" | "https" | "schemaTypes"
>;

export type RecordDefaults = Readonly<Pick<SEORecord, DefaultedField> & { schemaTypes: readonly string[] }>;

/**
 * Default value of every optional field that has a fixed default.
 * `h1Count`, `h2Count`, `hasSchemaMarkup` and `https` are derived from other fields when absent.
 */
export const RECORD_DEFAULTS: RecordDefaults = Object.freeze({
  title: null,
  metaDescription: null,
  wordCount: 0,
  keyword: null,
  keywordCount: 0,
  h1Text: null,
  h2Texts: [],
  h3Count: null,
  paragraphs: [],
  readabilityScore: null,
  imagesCount: 0,
  missingAltImagesCount: 0,
  hasCanonical: false,
  schemaTypes: [],
  robotsTxtPresent: false,
  sitemapPresent: false,
  renderBlockingResourcesCount: 0,
  lazyLoadingEnabled: false,
  largestContentfulPaint: null,
  firstInputDelay: null,
  cumulativeLayoutShift: null,
  mobileFriendly: false,
  authorCredentials: false,
  contactInfoPresent: false,
  lastUpdated: null,
  duplicateContentFlag: false,
  thinContentFlag: false,
});

/**
 * Normalize an audited URL: add https:// when no scheme is given,
 * lower-case the host and strip trailing slashes.
 *
 * @throws TypeError when the result is not an absolute http(s) URL
 */
export function normalizeUrl(raw: string): string {
  let url = raw.trim();
  if (!/^[a-z][a-z\d+.-]*:\/\//i.test(url)) {
    url = `https://${url}`;
  }

  const parsed = new URL(url);
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new TypeError(`Unsupported URL scheme "${parsed.protocol}"`);
  }
  if (!parsed.hostname) {
    throw new TypeError("URL has no host");
  }

  return parsed.href.replace(/\/+$/, "");
}

const count = z.number().int().nonnegative();
const measurement = z.number().nonnegative().nullish();

/** Trimmed text, empty strings collapse to null */
const text = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

const urlField = z.string().transform((value, ctx) => {
  try {
    return normalizeUrl(value);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid URL "${value}" (${err instanceof Error ? err.message : "unparseable"})`,
    });
    return z.NEVER;
  }
});

const recordInputSchema = z
  .object({
    url: urlField,

    title: text,
    metaDescription: text,
    wordCount: count.optional(),
    keyword: text,
    keywordCount: count.optional(),
    h1Text: text,
    h1Count: count.optional(),
    h2Texts: z.array(z.string()).optional(),
    h2Count: count.optional(),
    h3Count: count.nullish(),
    paragraphs: z.array(z.object({ text: z.string(), length: count.optional() })).optional(),
    readabilityScore: z.number().finite().nullish(),

    imagesCount: count.optional(),
    missingAltImagesCount: count.optional(),

    hasCanonical: z.boolean().optional(),
    hasSchemaMarkup: z.boolean().optional(),
    schemaTypes: z.preprocess(
      (value) => (value instanceof Set ? Array.from(value) : value),
      z.array(z.string().trim().min(1)).optional(),
    ),
    robotsTxtPresent: z.boolean().optional(),
    sitemapPresent: z.boolean().optional(),
    renderBlockingResourcesCount: count.optional(),
    lazyLoadingEnabled: z.boolean().optional(),
    https: z.boolean().optional(),

    largestContentfulPaint: measurement,
    firstInputDelay: measurement,
    cumulativeLayoutShift: measurement,
    mobileFriendly: z.boolean().optional(),

    authorCredentials: z.boolean().optional(),
    contactInfoPresent: z.boolean().optional(),
    lastUpdated: z.coerce.date().nullish(),
    duplicateContentFlag: z.boolean().optional(),
    thinContentFlag: z.boolean().optional(),
  })
  .superRefine((input, ctx) => {
    const images = input.imagesCount ?? RECORD_DEFAULTS.imagesCount;
    const missing = input.missingAltImagesCount ?? RECORD_DEFAULTS.missingAltImagesCount;
    if (missing > images) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["missingAltImagesCount"],
        message: `missingAltImagesCount (${missing}) exceeds imagesCount (${images})`,
      });
    }

    const words = input.wordCount ?? RECORD_DEFAULTS.wordCount;
    const keywordHits = input.keywordCount ?? RECORD_DEFAULTS.keywordCount;
    if (keywordHits > words) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["keywordCount"],
        message: `keywordCount (${keywordHits}) exceeds wordCount (${words})`,
      });
    }

    const h2Texts = input.h2Texts ?? RECORD_DEFAULTS.h2Texts;
    if (input.h2Count !== undefined && input.h2Count < h2Texts.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["h2Count"],
        message: `h2Count (${input.h2Count}) is less than the ${h2Texts.length} H2 texts given`,
      });
    }

    if (input.h1Count === 0 && input.h1Text) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["h1Count"],
        message: "h1Count is 0 but h1Text is set",
      });
    }
  });

type ParsedRecordInput = z.infer<typeof recordInputSchema>;

/**
 * Validate raw audit input and resolve every optional field to its default.
 * Returns a frozen (immutable) record ready for evaluate().
 *
 * @example
 * ```ts
 * import { defineRecord, evaluate } from 'pagehealth'
 *
 * const record = defineRecord({ url: 'example.com/blog', wordCount: 900 })
 * record.url   // "https://example.com/blog"
 * record.https // true
 * ```
 *
 * @throws RecordValidationError
 */
export function defineRecord(input: SEORecordInput): SEORecord {
  return parseRecord(input);
}

/**
 * Same as defineRecord() for values of unknown shape, such as records
 * read back from JSON.
 *
 * @throws RecordValidationError
 */
export function parseRecord(value: unknown): SEORecord {
  const parsed = recordInputSchema.safeParse(value);

  if (!parsed.success) {
    throw new RecordValidationError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    );
  }

  return resolveDefaults(parsed.data);
}

function resolveDefaults(input: ParsedRecordInput): SEORecord {
  const d = RECORD_DEFAULTS;
  const schemaTypes: ReadonlySet<string> = new Set(input.schemaTypes ?? d.schemaTypes);
  const h2Texts: readonly string[] = input.h2Texts ?? d.h2Texts;
  const rawParagraphs: ReadonlyArray<{ text: string; length?: number }> = input.paragraphs ?? d.paragraphs;
  const paragraphs: Paragraph[] = rawParagraphs.map((p) =>
    Object.freeze({ text: p.text, length: p.length ?? p.text.length }),
  );

  const record: SEORecord = {
    url: input.url,

    title: input.title,
    metaDescription: input.metaDescription,
    wordCount: input.wordCount ?? d.wordCount,
    keyword: input.keyword,
    keywordCount: input.keywordCount ?? d.keywordCount,
    h1Text: input.h1Text,
    h1Count: input.h1Count ?? (input.h1Text ? 1 : 0),
    h2Texts: Object.freeze([...h2Texts]),
    h2Count: input.h2Count ?? h2Texts.length,
    h3Count: input.h3Count ?? d.h3Count,
    paragraphs: Object.freeze(paragraphs),
    readabilityScore: input.readabilityScore ?? d.readabilityScore,

    imagesCount: input.imagesCount ?? d.imagesCount,
    missingAltImagesCount: input.missingAltImagesCount ?? d.missingAltImagesCount,

    hasCanonical: input.hasCanonical ?? d.hasCanonical,
    hasSchemaMarkup: input.hasSchemaMarkup ?? schemaTypes.size > 0,
    schemaTypes,
    robotsTxtPresent: input.robotsTxtPresent ?? d.robotsTxtPresent,
    sitemapPresent: input.sitemapPresent ?? d.sitemapPresent,
    renderBlockingResourcesCount: input.renderBlockingResourcesCount ?? d.renderBlockingResourcesCount,
    lazyLoadingEnabled: input.lazyLoadingEnabled ?? d.lazyLoadingEnabled,
    https: input.https ?? input.url.startsWith("https://"),

    largestContentfulPaint: input.largestContentfulPaint ?? d.largestContentfulPaint,
    firstInputDelay: input.firstInputDelay ?? d.firstInputDelay,
    cumulativeLayoutShift: input.cumulativeLayoutShift ?? d.cumulativeLayoutShift,
    mobileFriendly: input.mobileFriendly ?? d.mobileFriendly,

    authorCredentials: input.authorCredentials ?? d.authorCredentials,
    contactInfoPresent: input.contactInfoPresent ?? d.contactInfoPresent,
    lastUpdated: input.lastUpdated ?? d.lastUpdated,
    duplicateContentFlag: input.duplicateContentFlag ?? d.duplicateContentFlag,
    thinContentFlag: input.thinContentFlag ?? d.thinContentFlag,
  };

  return Object.freeze(record);
}
