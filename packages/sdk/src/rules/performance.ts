import type { RuleDefinition, SEORecord, RuleCheckResult } from "../types.js";

export const renderBlockingRule: RuleDefinition = {
  id: "render-blocking",
  name: "Render-Blocking Resources",
  group: "technical",
  description: "Scripts and stylesheets should not block the first paint",
  weight: 3,
  check(record: SEORecord): RuleCheckResult {
    const count = record.renderBlockingResourcesCount;
    if (count === 0) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: Math.min(3, count),
      message: `${count} render-blocking resource(s) delay the first paint. Defer non-critical scripts and inline critical CSS.`,
    };
  },
};

export const lazyLoadingRule: RuleDefinition = {
  id: "lazy-loading",
  name: "Lazy Loading",
  group: "technical",
  description: "Images should be lazy-loaded",
  weight: 1,
  check(record: SEORecord): RuleCheckResult {
    if (record.imagesCount === 0 || record.lazyLoadingEnabled) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: 1,
      message: 'Images are not lazy-loaded. Add loading="lazy" to below-the-fold images.',
    };
  },
};
