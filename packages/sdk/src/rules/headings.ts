import type { RuleDefinition, SEORecord, RuleCheckResult } from "../types.js";

/** Minimum section headings for a structured page */
export const MIN_H2_COUNT = 2;
export const MIN_H3_COUNT = 3;

function headingKey(text: string): string {
  return text.trim().toLowerCase();
}

export const h1PresentRule: RuleDefinition = {
  id: "h1-present",
  name: "H1 Heading Present",
  group: "meta",
  description: "Page must have an H1 heading",
  weight: 4,
  severity: "critical",
  check(record: SEORecord): RuleCheckResult {
    if (record.h1Count > 0) {
      return { status: "pass" };
    }
    return { status: "fail", deduction: 4, message: "Missing H1 heading. Add exactly one H1 that states the page topic." };
  },
};

export const h1SingleRule: RuleDefinition = {
  id: "h1-single",
  name: "Single H1",
  group: "meta",
  description: "Page should have exactly one H1 heading",
  weight: 2,
  check(record: SEORecord): RuleCheckResult {
    if (record.h1Count <= 1) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: 2,
      message: `${record.h1Count} H1 headings found. Keep a single H1 and demote the others to H2.`,
    };
  },
};

export const h1H2DistinctRule: RuleDefinition = {
  id: "h1-h2-distinct",
  name: "H1 and H2 Distinct",
  group: "meta",
  description: "H2 headings should not repeat the H1 text",
  weight: 1,
  check(record: SEORecord): RuleCheckResult {
    if (!record.h1Text) {
      return { status: "pass" };
    }

    const h1 = headingKey(record.h1Text);
    if (!record.h2Texts.some((h2) => headingKey(h2) === h1)) {
      return { status: "pass" };
    }

    return {
      status: "fail",
      deduction: 1,
      message: `H1 and H2 have identical text: "${record.h1Text}". Give each heading distinct wording.`,
    };
  },
};

export const h2UniqueRule: RuleDefinition = {
  id: "h2-unique",
  name: "Unique H2 Headings",
  group: "meta",
  description: "Each H2 heading should have unique text",
  weight: 1,
  check(record: SEORecord): RuleCheckResult {
    const seen = new Map<string, number>();
    const firstText = new Map<string, string>();

    for (const h2 of record.h2Texts) {
      const key = headingKey(h2);
      if (!key) continue;
      seen.set(key, (seen.get(key) ?? 0) + 1);
      if (!firstText.has(key)) firstText.set(key, h2.trim());
    }

    const duplicates = [...seen]
      .filter(([, count]) => count > 1)
      .map(([key]) => firstText.get(key) ?? key);

    if (duplicates.length === 0) {
      return { status: "pass" };
    }

    return {
      status: "fail",
      deduction: 1,
      message: `Duplicate H2 headings: "${duplicates.join('", "')}". Make each section heading unique.`,
    };
  },
};

export const headingStructureRule: RuleDefinition = {
  id: "heading-structure",
  name: "Heading Structure",
  group: "meta",
  description: "Page should have at least 2 H2 and 3 H3 headings",
  weight: 2,
  check(record: SEORecord): RuleCheckResult {
    // H3 headings were not counted
    if (record.h3Count === null) {
      return { status: "pass" };
    }

    if (record.h2Count >= MIN_H2_COUNT && record.h3Count >= MIN_H3_COUNT) {
      return { status: "pass" };
    }

    return {
      status: "fail",
      deduction: 2,
      message: `Shallow heading structure: ${record.h2Count} H2 and ${record.h3Count} H3 headings. Organize the content into at least ${MIN_H2_COUNT} H2 sections with ${MIN_H3_COUNT} or more H3 subsections.`,
    };
  },
};
