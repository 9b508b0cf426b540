import type { RuleDefinition, SEORecord, RuleCheckResult } from "../types.js";

/** schema.org types eligible for rich results or commonly understood by search engines */
export const SUPPORTED_SCHEMA_TYPES: ReadonlySet<string> = new Set([
  "AboutPage",
  "AggregateRating",
  "Article",
  "BlogPosting",
  "Book",
  "BreadcrumbList",
  "CollectionPage",
  "ContactPage",
  "Course",
  "Dataset",
  "Event",
  "FAQPage",
  "HowTo",
  "ImageObject",
  "ItemList",
  "JobPosting",
  "LocalBusiness",
  "NewsArticle",
  "Offer",
  "Organization",
  "Person",
  "Product",
  "QAPage",
  "Recipe",
  "Review",
  "SoftwareApplication",
  "VideoObject",
  "WebPage",
  "WebSite",
]);

export const schemaPresentRule: RuleDefinition = {
  id: "schema-present",
  name: "Schema Markup Present",
  group: "technical",
  description: "Page should embed structured data",
  weight: 2,
  check(record: SEORecord): RuleCheckResult {
    if (record.hasSchemaMarkup) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: 2,
      message: "No schema markup detected. Implement structured data (JSON-LD) to qualify for rich results.",
    };
  },
};

export const schemaTypesRule: RuleDefinition = {
  id: "schema-types",
  name: "Schema Types Valid",
  group: "technical",
  description: "Structured data should declare supported schema.org types",
  weight: 3,
  check(record: SEORecord): RuleCheckResult {
    // Absence is schema-present's concern
    if (!record.hasSchemaMarkup) {
      return { status: "pass" };
    }

    if (record.schemaTypes.size === 0) {
      return {
        status: "fail",
        deduction: 3,
        message: "Schema markup detected but its type could not be determined. Declare an explicit @type.",
      };
    }

    const unsupported = [...record.schemaTypes].filter((type) => !SUPPORTED_SCHEMA_TYPES.has(type));
    if (unsupported.length === 0) {
      return { status: "pass" };
    }

    return {
      status: "fail",
      deduction: 3,
      message: `Unsupported schema types: ${unsupported.join(", ")}. Use recognized schema.org types such as Article, WebPage or Product.`,
    };
  },
};
