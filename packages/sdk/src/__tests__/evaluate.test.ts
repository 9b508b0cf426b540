import { describe, it, expect } from "vitest";
import { evaluate, computeMetrics, scoreToGrade, RULE_GROUPS } from "../evaluate.js";
import { defineRecord } from "../record.js";
import { allRules } from "../rules/index.js";
import { NOW, idealInput } from "./fixtures.js";
import type { SEORecordInput } from "../types.js";

function run(overrides: Partial<SEORecordInput> = {}) {
  return evaluate(defineRecord(idealInput(overrides)), { now: NOW });
}

describe("rule registry", () => {
  it("weights sum to 100", () => {
    expect(allRules.reduce((sum, r) => sum + r.weight, 0)).toBe(100);
  });

  it("has fixed group weights", () => {
    const weights = Object.fromEntries(
      RULE_GROUPS.map((g) => [g, allRules.filter((r) => r.group === g).reduce((s, r) => s + r.weight, 0)]),
    );
    expect(weights).toEqual({ content: 20, meta: 20, technical: 25, media: 10, vitals: 15, eeat: 10 });
  });

  it("has unique rule ids", () => {
    const ids = allRules.map((r) => r.id);
    expect(new Set(ids).size).toBe(ids.length);
  });
});

describe("evaluate", () => {
  it("scores a page with every check passing at 100 with no recommendations", () => {
    const result = run();

    expect(result.healthPercentage).toBe(100);
    expect(result.grade).toBe("A");
    expect(result.recommendations).toEqual([]);
    expect(result.findings).toEqual([]);
    expect(result.hasCriticalErrors).toBe(false);
    expect(result.breakdown.technical).toEqual({ weight: 25, deduction: 0, score: 25 });
  });

  it("scores a mostly healthy page highly with a short recommendation list", () => {
    const result = run({
      robotsTxtPresent: false,
      sitemapPresent: false,
      renderBlockingResourcesCount: 2,
      lazyLoadingEnabled: false,
    });

    expect(result.healthPercentage).toBe(93);
    expect(result.hasCriticalErrors).toBe(false);
    expect(result.recommendations).toEqual([
      "No robots.txt found. Publish a robots.txt at the site root that allows crawling of important pages.",
      "No XML sitemap found. Publish a sitemap.xml and reference it from robots.txt.",
      "2 render-blocking resource(s) delay the first paint. Defer non-critical scripts and inline critical CSS.",
      'Images are not lazy-loaded. Add loading="lazy" to below-the-fold images.',
    ]);
  });

  it("puts the HTTPS recommendation first when HTTPS is off", () => {
    const result = run({
      https: false,
      robotsTxtPresent: false,
      sitemapPresent: false,
      renderBlockingResourcesCount: 2,
      lazyLoadingEnabled: false,
    });

    expect(result.healthPercentage).toBe(85);
    expect(result.hasCriticalErrors).toBe(true);
    expect(result.recommendations[0]).toBe(
      "Page is not served over HTTPS. Enable HTTPS and redirect all HTTP traffic to it.",
    );
    expect(result.recommendations).toHaveLength(5);
  });

  it("flags critical errors without HTTPS regardless of other fields", () => {
    expect(run({ https: false }).hasCriticalErrors).toBe(true);
    expect(evaluate(defineRecord({ url: "http://example.com" }), { now: NOW }).hasCriticalErrors).toBe(true);
  });

  it("never increases the score as more images lose alt text", () => {
    const scores = [0, 1, 2, 3, 4, 5].map(
      (missing) => run({ imagesCount: 5, missingAltImagesCount: missing }).healthPercentage,
    );

    expect(scores).toEqual([100, 99, 97, 96, 94, 93]);
    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeLessThanOrEqual(scores[i - 1]);
    }
  });

  it("is deterministic", () => {
    const record = defineRecord(idealInput({ title: "Short", hasCanonical: false }));
    expect(evaluate(record, { now: NOW })).toEqual(evaluate(record, { now: NOW }));
  });

  it("orders critical findings before bigger optional deductions", () => {
    const result = run({ title: null, duplicateContentFlag: true });

    expect(result.findings.map((f) => f.ruleId)).toEqual(["duplicate-content", "title-length"]);
    expect(result.findings[0]).toMatchObject({ severity: "critical", deduction: 2, group: "eeat" });
    expect(result.findings[1]).toMatchObject({ severity: "optional", deduction: 6, group: "meta" });
  });

  it("breaks deduction ties by rule order", () => {
    const result = run({ authorCredentials: false, hasCanonical: false, contactInfoPresent: false });
    // canonical (4) first, then the two 2-point E-E-A-T rules in registry order
    expect(result.findings.map((f) => f.ruleId)).toEqual(["canonical", "author-credentials", "contact-info"]);
  });

  it("stays within 0-100 for a record with every default", () => {
    const result = evaluate(defineRecord({ url: "http://example.com" }), { now: NOW });

    expect(result.healthPercentage).toBeGreaterThanOrEqual(0);
    expect(result.healthPercentage).toBeLessThanOrEqual(100);
    // content-length 7, title 6, description 4, h1 4, https 8, canonical 4, schema 2,
    // robots 2, sitemap 2, mobile 4, author 2, contact 2, freshness 2
    expect(result.healthPercentage).toBe(51);
    expect(result.grade).toBe("F");
  });

  it("skips disabled rules and keeps their full credit", () => {
    const result = evaluate(defineRecord(idealInput({ https: false })), {
      now: NOW,
      disabledRules: ["https"],
    });

    expect(result.healthPercentage).toBe(100);
    expect(result.hasCriticalErrors).toBe(false);
    expect(result.breakdown.technical).toEqual({ weight: 25, deduction: 0, score: 25 });
  });

  it("records each deduction in its group breakdown", () => {
    const result = run({ hasCanonical: false, mobileFriendly: false });

    expect(result.breakdown.technical).toEqual({ weight: 25, deduction: 4, score: 21 });
    expect(result.breakdown.vitals).toEqual({ weight: 15, deduction: 4, score: 11 });
    expect(result.healthPercentage).toBe(92);
  });
});

describe("content rules", () => {
  it("penalizes thin content by word count", () => {
    const short = run({ wordCount: 200, keywordCount: 3 });
    expect(short.findings.find((f) => f.ruleId === "content-length")).toMatchObject({
      deduction: 4,
      message: "Thin content: only 200 words. Expand the page to at least 300 words of useful text.",
    });

    const tiny = run({ wordCount: 100, keywordCount: 1 });
    expect(tiny.findings.find((f) => f.ruleId === "content-length")?.deduction).toBe(7);
  });

  it("flags keyword stuffing", () => {
    const result = run({ keywordCount: 30 });
    expect(result.findings.find((f) => f.ruleId === "keyword-density")).toMatchObject({
      deduction: 6,
      message:
        'Keyword density too high (3.43%). Use "coffee berlin" less often to avoid keyword stuffing; aim for 1-2.5%.',
    });
  });

  it("flags low keyword density with a recommended count", () => {
    const result = run({ keywordCount: 5 });
    expect(result.findings.find((f) => f.ruleId === "keyword-density")).toMatchObject({
      deduction: 3,
      message: 'Keyword density too low (0.57%). Use "coffee berlin" about 3 time(s) to reach 1-2.5%.',
    });
  });

  it("does not fail on a zero word count", () => {
    const result = run({ wordCount: 0, keywordCount: 0 });
    expect(result.metrics.keywordDensity).toBe(0);
    expect(result.metrics.recommendedKeywordCount).toBe(0);
    expect(result.findings.find((f) => f.ruleId === "keyword-density")).toMatchObject({
      deduction: 6,
      message:
        'Keyword density cannot be measured: the page has no counted words. Add text that uses "coffee berlin" naturally.',
    });
    expect(result.findings.find((f) => f.ruleId === "keyword-count")).toBeUndefined();
  });

  it("judges density on the unrounded ratio just above the range", () => {
    // 100 / 3993 = 2.5044%, displayed as 2.5
    const result = run({ wordCount: 3993, keywordCount: 100 });

    expect(result.metrics.keywordDensity).toBe(2.5);
    expect(result.findings).toEqual([
      {
        ruleId: "keyword-density",
        group: "content",
        severity: "optional",
        deduction: 6,
        message:
          'Keyword density too high (2.50%). Use "coffee berlin" less often to avoid keyword stuffing; aim for 1-2.5%.',
      },
    ]);
    expect(result.healthPercentage).toBe(94);
  });

  it("treats a rare keyword as low density rather than absent", () => {
    // 1 / 30000 = 0.0033%, displayed as 0
    const result = run({ wordCount: 30000, keywordCount: 1 });

    expect(result.metrics.keywordDensity).toBe(0);
    expect(result.findings.map((f) => [f.ruleId, f.deduction, f.message])).toEqual([
      [
        "keyword-density",
        3,
        'Keyword density too low (<0.01%). Use "coffee berlin" about 100 time(s) to reach 1-2.5%.',
      ],
      ["keyword-count", 1, 'Keyword "coffee berlin" appears 1 time(s). Use it about 100 time(s), once per 300 words.'],
    ]);
    expect(result.healthPercentage).toBe(96);
  });

  it("flags a keyword used less than once per 300 words", () => {
    const result = run({ wordCount: 1200, keywordCount: 2 });

    expect(result.metrics.recommendedKeywordCount).toBe(4);
    expect(result.findings.find((f) => f.ruleId === "keyword-count")?.message).toBe(
      'Keyword "coffee berlin" appears 2 time(s). Use it about 4 time(s), once per 300 words.',
    );
  });

  it("flags hard-to-read content only when readability was measured", () => {
    expect(run({ readabilityScore: 45.5 }).findings).toEqual([
      {
        ruleId: "readability",
        group: "content",
        severity: "optional",
        deduction: 1,
        message:
          "Content may be difficult to read (reading ease 45.5). Use shorter sentences and plainer words to reach 60 or more.",
      },
    ]);
    expect(run({ readabilityScore: 60 }).healthPercentage).toBe(100);
    expect(run({ readabilityScore: null }).healthPercentage).toBe(100);
  });

  it("ignores keyword rules without a keyword", () => {
    const result = run({ keyword: null, keywordCount: 0 });
    expect(result.healthPercentage).toBe(100);
  });

  it("flags long paragraphs proportionally", () => {
    const long = { text: "word ".repeat(40) };
    const result = run({
      paragraphs: [long, long, { text: "coffee berlin today" }, { text: "coffee berlin tomorrow" }],
    });

    expect(result.findings.find((f) => f.ruleId === "paragraph-length")).toMatchObject({
      deduction: 2,
      message: "2 of 4 paragraphs exceed 160 characters. Split long paragraphs to keep them readable.",
    });
  });

  it("flags a keyword missing from most paragraphs", () => {
    const result = run({
      paragraphs: [{ text: "About coffee berlin" }, { text: "One" }, { text: "Two" }, { text: "Three" }],
    });

    expect(result.findings.find((f) => f.ruleId === "keyword-distribution")?.message).toBe(
      'Keyword "coffee berlin" appears in only 1 of 4 paragraphs. Distribute it more evenly across the content.',
    );
  });
});

describe("meta and header rules", () => {
  it.each([
    [null, 6],
    ["A".repeat(20), 6],
    ["A".repeat(40), 3],
    ["A".repeat(55), 0],
    ["A".repeat(65), 3],
    ["A".repeat(80), 6],
  ])("title %#: deducts %i", (title, expected) => {
    const finding = run({ title }).findings.find((f) => f.ruleId === "title-length");
    expect(finding?.deduction ?? 0).toBe(expected);
  });

  it.each([
    [null, 4],
    ["A".repeat(50), 4],
    ["A".repeat(120), 2],
    ["A".repeat(155), 0],
    ["A".repeat(180), 2],
    ["A".repeat(250), 4],
  ])("meta description %#: deducts %i", (metaDescription, expected) => {
    const finding = run({ metaDescription }).findings.find((f) => f.ruleId === "description-length");
    expect(finding?.deduction ?? 0).toBe(expected);
  });

  it("treats a missing H1 as a critical error", () => {
    const result = run({ h1Text: null });
    expect(result.hasCriticalErrors).toBe(true);
    expect(result.recommendations[0]).toBe("Missing H1 heading. Add exactly one H1 that states the page topic.");
  });

  it("flags multiple H1 headings", () => {
    const result = run({ h1Count: 3 });
    expect(result.recommendations).toEqual([
      "3 H1 headings found. Keep a single H1 and demote the others to H2.",
    ]);
  });

  it("flags an H2 that repeats the H1", () => {
    const result = run({ h2Texts: ["coffee in berlin ", "Roasters"] });
    expect(result.recommendations).toEqual([
      'H1 and H2 have identical text: "Coffee in Berlin". Give each heading distinct wording.',
    ]);
  });

  it("checks heading structure once H3 headings are counted", () => {
    expect(run({ h3Count: 4 }).healthPercentage).toBe(100);

    const shallow = run({ h3Count: 1 });
    expect(shallow.findings).toEqual([
      {
        ruleId: "heading-structure",
        group: "meta",
        severity: "optional",
        deduction: 2,
        message:
          "Shallow heading structure: 3 H2 and 1 H3 headings. Organize the content into at least 2 H2 sections with 3 or more H3 subsections.",
      },
    ]);

    const oneSection = run({ h2Texts: ["Roasters"], h3Count: 5 });
    expect(oneSection.findings.map((f) => f.ruleId)).toEqual(["heading-structure"]);
  });

  it("flags duplicate H2 headings", () => {
    const result = run({ h2Texts: ["Roasters", "Prices", "roasters", "Prices", "Map"] });
    expect(result.recommendations).toEqual([
      'Duplicate H2 headings: "Roasters", "Prices". Make each section heading unique.',
    ]);
  });
});

describe("technical rules", () => {
  it("penalizes missing schema markup lightly", () => {
    const result = run({ schemaTypes: [] });
    expect(result.findings).toEqual([
      {
        ruleId: "schema-present",
        group: "technical",
        severity: "optional",
        deduction: 2,
        message: "No schema markup detected. Implement structured data (JSON-LD) to qualify for rich results.",
      },
    ]);
  });

  it("penalizes unsupported schema types more than missing markup", () => {
    const result = run({ schemaTypes: ["Article", "MadeUpThing"] });
    expect(result.findings).toHaveLength(1);
    expect(result.findings[0]).toMatchObject({
      ruleId: "schema-types",
      deduction: 3,
      message: "Unsupported schema types: MadeUpThing. Use recognized schema.org types such as Article, WebPage or Product.",
    });
  });

  it("flags markup without a determinable type", () => {
    const result = run({ schemaTypes: [], hasSchemaMarkup: true });
    expect(result.findings.map((f) => f.ruleId)).toEqual(["schema-types"]);
  });

  it("caps the render-blocking deduction", () => {
    const result = run({ renderBlockingResourcesCount: 12 });
    expect(result.findings[0]).toMatchObject({ ruleId: "render-blocking", deduction: 3 });
  });

  it("does not require lazy loading without images", () => {
    const result = run({ imagesCount: 0, lazyLoadingEnabled: false });
    expect(result.healthPercentage).toBe(100);
  });
});

describe("media rules", () => {
  it("reports the share of images missing alt text", () => {
    const result = run({ imagesCount: 4, missingAltImagesCount: 1 });
    expect(result.findings[0]).toMatchObject({
      ruleId: "image-alt",
      deduction: 2,
      message: "1 of 4 images are missing alt text. Add descriptive alt attributes to every image.",
    });
  });

  it("flags image-heavy pages", () => {
    const result = run({ imagesCount: 20 });
    expect(result.findings.map((f) => f.ruleId)).toEqual(["image-density"]);
  });
});

describe("vitals rules", () => {
  it("penalizes LCP above the good threshold", () => {
    const result = run({ largestContentfulPaint: 3000 });
    expect(result.findings[0]).toMatchObject({ ruleId: "lcp", deduction: 3, severity: "optional" });
    expect(result.hasCriticalErrors).toBe(false);
  });

  it("treats LCP above the poor threshold as critical", () => {
    const result = run({ largestContentfulPaint: 4500 });
    expect(result.findings[0]).toMatchObject({ ruleId: "lcp", deduction: 5, severity: "critical" });
    expect(result.hasCriticalErrors).toBe(true);
  });

  it("penalizes slow input delay and layout shift", () => {
    const result = run({ firstInputDelay: 150, cumulativeLayoutShift: 0.3 });
    expect(result.findings.map((f) => [f.ruleId, f.deduction])).toEqual([
      ["cls", 3],
      ["fid", 2],
    ]);
    expect(result.findings[0].message).toBe(
      "Cumulative Layout Shift is 0.3 (good is 0.1 or less). Reserve space for images, ads and embeds.",
    );
  });

  it("skips vitals that were not measured", () => {
    const result = run({ largestContentfulPaint: null, firstInputDelay: null, cumulativeLayoutShift: null });
    expect(result.healthPercentage).toBe(100);
  });

  it("treats a page that is not mobile-friendly as critical", () => {
    expect(run({ mobileFriendly: false }).hasCriticalErrors).toBe(true);
  });
});

describe("E-E-A-T rules", () => {
  it("flags outdated content", () => {
    const result = run({ lastUpdated: "2025-04-27T00:00:00Z" });
    expect(result.recommendations).toEqual([
      "Content may be outdated: last updated 400 days ago. Review and refresh it at least once a year.",
    ]);
  });

  it("accepts content updated exactly a year ago", () => {
    expect(run({ lastUpdated: "2025-06-01T00:00:00Z" }).healthPercentage).toBe(100);
  });

  it("flags a missing last-updated date", () => {
    const result = run({ lastUpdated: null });
    expect(result.findings.map((f) => f.ruleId)).toEqual(["content-freshness"]);
  });

  it("treats duplicate or thin content flags as critical", () => {
    expect(run({ duplicateContentFlag: true }).hasCriticalErrors).toBe(true);
    expect(run({ thinContentFlag: true }).hasCriticalErrors).toBe(true);
  });
});

describe("computeMetrics", () => {
  it("derives lengths, density and paragraph statistics", () => {
    expect(computeMetrics(defineRecord(idealInput()))).toEqual({
      titleLength: 53,
      metaDescriptionLength: 157,
      keywordDensity: 1.14,
      recommendedKeywordCount: 3,
      longParagraphCount: 0,
      keywordParagraphCount: 2,
      keywordParagraphCoverage: 0.4,
    });
  });
});

describe("scoreToGrade", () => {
  it.each([
    [100, "A"],
    [90, "A"],
    [89, "B"],
    [70, "C"],
    [60, "D"],
    [59, "F"],
  ])("%i -> %s", (score, grade) => {
    expect(scoreToGrade(score)).toBe(grade);
  });
});
