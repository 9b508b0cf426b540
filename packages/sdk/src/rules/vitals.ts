import type { RuleDefinition, SEORecord, RuleCheckResult } from "../types.js";

/** Core Web Vitals thresholds ("good" / "poor") */
export const VITALS_THRESHOLDS = {
  lcp: { good: 2500, poor: 4000 },
  fid: { good: 100, poor: 300 },
  cls: { good: 0.1, poor: 0.25 },
} as const;

// Unmeasured vitals (null) are skipped, not penalized

export const lcpRule: RuleDefinition = {
  id: "lcp",
  name: "Largest Contentful Paint",
  group: "vitals",
  description: "LCP should be 2500 ms or less",
  weight: 5,
  check(record: SEORecord): RuleCheckResult {
    const lcp = record.largestContentfulPaint;
    const { good, poor } = VITALS_THRESHOLDS.lcp;
    if (lcp === null || lcp <= good) {
      return { status: "pass" };
    }

    const ms = Math.round(lcp);
    if (lcp > poor) {
      return {
        status: "fail",
        deduction: 5,
        severity: "critical",
        message: `Largest Contentful Paint is ${ms} ms, above the ${poor} ms "poor" threshold. Optimize the largest above-the-fold element and server response time.`,
      };
    }

    return {
      status: "fail",
      deduction: 3,
      message: `Largest Contentful Paint is ${ms} ms (good is ${good} ms or less). Optimize the largest above-the-fold element and server response time.`,
    };
  },
};

export const fidRule: RuleDefinition = {
  id: "fid",
  name: "First Input Delay",
  group: "vitals",
  description: "FID should be 100 ms or less",
  weight: 3,
  check(record: SEORecord): RuleCheckResult {
    const fid = record.firstInputDelay;
    const { good, poor } = VITALS_THRESHOLDS.fid;
    if (fid === null || fid <= good) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: fid > poor ? 3 : 2,
      message: `First Input Delay is ${Math.round(fid)} ms (good is ${good} ms or less). Break up long JavaScript tasks on the main thread.`,
    };
  },
};

export const clsRule: RuleDefinition = {
  id: "cls",
  name: "Cumulative Layout Shift",
  group: "vitals",
  description: "CLS should be 0.1 or less",
  weight: 3,
  check(record: SEORecord): RuleCheckResult {
    const cls = record.cumulativeLayoutShift;
    const { good, poor } = VITALS_THRESHOLDS.cls;
    if (cls === null || cls <= good) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: cls > poor ? 3 : 2,
      message: `Cumulative Layout Shift is ${Number(cls.toFixed(3))} (good is ${good} or less). Reserve space for images, ads and embeds.`,
    };
  },
};

export const mobileFriendlyRule: RuleDefinition = {
  id: "mobile-friendly",
  name: "Mobile Friendly",
  group: "vitals",
  description: "Page must render well on mobile devices",
  weight: 4,
  severity: "critical",
  check(record: SEORecord): RuleCheckResult {
    if (record.mobileFriendly) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: 4,
      message: "Page is not mobile-friendly. Add a responsive viewport and a layout that works on small screens.",
    };
  },
};
