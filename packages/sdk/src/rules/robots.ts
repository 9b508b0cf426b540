import type { RuleDefinition, SEORecord, RuleCheckResult } from "../types.js";

export const robotsTxtRule: RuleDefinition = {
  id: "robots-txt",
  name: "robots.txt",
  group: "technical",
  description: "Site should publish a robots.txt file",
  weight: 2,
  check(record: SEORecord): RuleCheckResult {
    if (record.robotsTxtPresent) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: 2,
      message: "No robots.txt found. Publish a robots.txt at the site root that allows crawling of important pages.",
    };
  },
};

export const sitemapRule: RuleDefinition = {
  id: "sitemap",
  name: "XML Sitemap",
  group: "technical",
  description: "Site should publish an XML sitemap",
  weight: 2,
  check(record: SEORecord): RuleCheckResult {
    if (record.sitemapPresent) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: 2,
      message: "No XML sitemap found. Publish a sitemap.xml and reference it from robots.txt.",
    };
  },
};
