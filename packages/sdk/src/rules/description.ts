import type { RuleDefinition, SEORecord, RuleContext, RuleCheckResult } from "../types.js";

export const descriptionLengthRule: RuleDefinition = {
  id: "description-length",
  name: "Meta Description Length",
  group: "meta",
  description: "Meta description should be between 150 and 160 characters",
  weight: 4,
  check(_record: SEORecord, { metrics }: RuleContext): RuleCheckResult {
    const len = metrics.metaDescriptionLength;

    if (len === 0) {
      return { status: "fail", deduction: 4, message: "Missing meta description. Write a 150-160 character summary of the page." };
    }

    if (len >= 150 && len <= 160) {
      return { status: "pass" };
    }

    if (len >= 70 && len < 150) {
      return { status: "fail", deduction: 2, message: `Meta description is ${len} characters, slightly short. Aim for 150-160 characters.` };
    }

    if (len > 160 && len <= 200) {
      return { status: "fail", deduction: 2, message: `Meta description is ${len} characters and may be truncated in SERPs. Aim for 150-160 characters.` };
    }

    return {
      status: "fail",
      deduction: 4,
      message: len < 70
        ? `Meta description is only ${len} characters. Expand it to 150-160 characters.`
        : `Meta description is ${len} characters and will be truncated in SERPs. Trim it to 150-160 characters.`,
    };
  },
};
