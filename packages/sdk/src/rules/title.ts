import type { RuleDefinition, SEORecord, RuleContext, RuleCheckResult } from "../types.js";

export const titleLengthRule: RuleDefinition = {
  id: "title-length",
  name: "Title Length",
  group: "meta",
  description: "Title should be between 50 and 60 characters for optimal display in SERPs",
  weight: 6,
  check(_record: SEORecord, { metrics }: RuleContext): RuleCheckResult {
    const len = metrics.titleLength;

    if (len === 0) {
      return { status: "fail", deduction: 6, message: "Missing title tag. Add a descriptive title of 50-60 characters." };
    }

    if (len >= 50 && len <= 60) {
      return { status: "pass" };
    }

    if (len >= 30 && len < 50) {
      return { status: "fail", deduction: 3, message: `Title is ${len} characters, slightly short. Lengthen it to 50-60 characters.` };
    }

    if (len > 60 && len <= 70) {
      return { status: "fail", deduction: 3, message: `Title is ${len} characters and may be truncated in SERPs. Shorten it to 50-60 characters.` };
    }

    return {
      status: "fail",
      deduction: 6,
      message: len < 30
        ? `Title is only ${len} characters. Expand it to 50-60 characters.`
        : `Title is ${len} characters and will be truncated in SERPs. Shorten it to 50-60 characters.`,
    };
  },
};
