import { defineRecord, evaluate, type SEORecordInput, type StoredAudit } from "pagehealth";

export const NOW = new Date("2026-06-01T00:00:00Z");

/** A page that passes every rule */
export function cleanPage(overrides: Partial<SEORecordInput> = {}): SEORecordInput {
  return {
    url: "https://example.com/menu",
    title: "Seasonal Menu at the Corner Bakery: Breads and Pastries",
    metaDescription:
      "Fresh sourdough, croissants and seasonal tarts baked every morning at the Corner Bakery. See this week's menu, opening hours and prices before you visit us.",
    wordCount: 600,
    keyword: "corner bakery",
    keywordCount: 8,
    h1Text: "Our seasonal menu",
    h2Texts: ["Breads", "Pastries"],
    paragraphs: [
      { text: "The corner bakery opens at seven with bread straight from the oven." },
      { text: "Pastries change with the season." },
      { text: "Ask the corner bakery team about custom cakes." },
    ],
    imagesCount: 2,
    hasCanonical: true,
    schemaTypes: ["LocalBusiness"],
    robotsTxtPresent: true,
    sitemapPresent: true,
    lazyLoadingEnabled: true,
    largestContentfulPaint: 1800,
    firstInputDelay: 40,
    cumulativeLayoutShift: 0.02,
    mobileFriendly: true,
    authorCredentials: true,
    contactInfoPresent: true,
    lastUpdated: NOW,
    ...overrides,
  };
}

export function storedAudit(input: SEORecordInput, updatedAt = NOW): StoredAudit {
  const record = defineRecord(input);
  return { record, result: evaluate(record, { now: NOW }), createdAt: NOW, updatedAt };
}
