import type { RuleDefinition, SEORecord, RuleContext, RuleCheckResult } from "../types.js";

/** Content older than this is considered outdated */
export const STALE_AFTER_DAYS = 365;
const DAY_MS = 24 * 60 * 60 * 1000;

export const authorCredentialsRule: RuleDefinition = {
  id: "author-credentials",
  name: "Author Credentials",
  group: "eeat",
  description: "Content should show who wrote it and why they are qualified",
  weight: 2,
  check(record: SEORecord): RuleCheckResult {
    if (record.authorCredentials) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: 2,
      message: "Author credentials missing. Add an author byline that shows relevant expertise.",
    };
  },
};

export const contactInfoRule: RuleDefinition = {
  id: "contact-info",
  name: "Contact Information",
  group: "eeat",
  description: "Site should make contact information easy to find",
  weight: 2,
  check(record: SEORecord): RuleCheckResult {
    if (record.contactInfoPresent) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: 2,
      message: "Contact information missing. Publish contact details or link to a contact page.",
    };
  },
};

export const duplicateContentRule: RuleDefinition = {
  id: "duplicate-content",
  name: "Duplicate Content",
  group: "eeat",
  description: "Page content must be original",
  weight: 2,
  severity: "critical",
  check(record: SEORecord): RuleCheckResult {
    if (!record.duplicateContentFlag) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: 2,
      message: "Duplicate content detected. Rewrite the page or point its canonical tag at the original.",
    };
  },
};

export const thinContentFlagRule: RuleDefinition = {
  id: "thin-content-flag",
  name: "Thin Content Flag",
  group: "eeat",
  description: "Page must not be flagged as thin content",
  weight: 2,
  severity: "critical",
  check(record: SEORecord): RuleCheckResult {
    if (!record.thinContentFlag) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: 2,
      message: "Page flagged as thin content. Add substantial, original information that answers the searcher's question.",
    };
  },
};

export const contentFreshnessRule: RuleDefinition = {
  id: "content-freshness",
  name: "Content Freshness",
  group: "eeat",
  description: "Content should have been updated within the last 12 months",
  weight: 2,
  check(record: SEORecord, { now }: RuleContext): RuleCheckResult {
    if (record.lastUpdated === null) {
      return {
        status: "fail",
        deduction: 2,
        message: "Content may be outdated: no last-updated date. Review the content and show when it was last updated.",
      };
    }

    const ageDays = Math.floor((now.getTime() - record.lastUpdated.getTime()) / DAY_MS);
    if (ageDays <= STALE_AFTER_DAYS) {
      return { status: "pass" };
    }

    return {
      status: "fail",
      deduction: 2,
      message: `Content may be outdated: last updated ${ageDays} days ago. Review and refresh it at least once a year.`,
    };
  },
};
