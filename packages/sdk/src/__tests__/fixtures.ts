import type { SEORecordInput } from "../types.js";

/** Reference clock for freshness checks */
export const NOW = new Date("2026-06-01T00:00:00Z");

/** A page that passes every rule */
export function idealInput(overrides: Partial<SEORecordInput> = {}): SEORecordInput {
  return {
    url: "https://example.com/guides/coffee-berlin",
    title: "Best Coffee in Berlin: Specialty Cafes Worth the Trip",
    metaDescription:
      "A local guide to coffee in Berlin: specialty roasters, neighbourhood cafes and the best flat whites, with opening hours, prices and tips for your next visit.",
    wordCount: 875,
    keyword: "coffee berlin",
    keywordCount: 10,
    h1Text: "Coffee in Berlin",
    h2Texts: ["Where to start", "Neighbourhood picks", "Roasters to know"],
    paragraphs: [
      { text: "Coffee Berlin lovers have more choice than ever, from tiny espresso bars to big roasteries." },
      { text: "Start in Kreuzberg, where most cafes open early and serve filter coffee by the cup." },
      { text: "Many places roast their own beans and sell them by the bag." },
      { text: "The coffee Berlin scene changes quickly, so check opening hours before you go." },
      { text: "If you only have a weekend, plan two cafe stops a day and walk between them." },
    ],
    imagesCount: 5,
    missingAltImagesCount: 0,
    hasCanonical: true,
    schemaTypes: ["Article"],
    robotsTxtPresent: true,
    sitemapPresent: true,
    renderBlockingResourcesCount: 0,
    lazyLoadingEnabled: true,
    largestContentfulPaint: 2100,
    firstInputDelay: 80,
    cumulativeLayoutShift: 0.05,
    mobileFriendly: true,
    authorCredentials: true,
    contactInfoPresent: true,
    lastUpdated: NOW,
    duplicateContentFlag: false,
    thinContentFlag: false,
    ...overrides,
  };
}
