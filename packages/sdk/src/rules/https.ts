import type { RuleDefinition, SEORecord, RuleCheckResult } from "../types.js";

export const httpsRule: RuleDefinition = {
  id: "https",
  name: "HTTPS",
  group: "technical",
  description: "Page must be served over HTTPS",
  weight: 8,
  severity: "critical",
  check(record: SEORecord): RuleCheckResult {
    if (record.https) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: 8,
      message: "Page is not served over HTTPS. Enable HTTPS and redirect all HTTP traffic to it.",
    };
  },
};
