import type { RuleDefinition, SEORecord, RuleCheckResult } from "../types.js";

export const canonicalRule: RuleDefinition = {
  id: "canonical",
  name: "Canonical URL",
  group: "technical",
  description: "Page should have a canonical URL to avoid duplicate content issues",
  weight: 4,
  check(record: SEORecord): RuleCheckResult {
    if (record.hasCanonical) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: 4,
      message: 'Missing canonical tag. Add a rel="canonical" link pointing to the preferred URL.',
    };
  },
};
