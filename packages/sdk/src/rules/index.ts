import type { RuleDefinition } from "../types.js";

import {
  contentLengthRule,
  keywordDensityRule,
  keywordCountRule,
  keywordDistributionRule,
  paragraphLengthRule,
  readabilityRule,
} from "./content.js";
import { titleLengthRule } from "./title.js";
import { descriptionLengthRule } from "./description.js";
import {
  h1PresentRule,
  h1SingleRule,
  h1H2DistinctRule,
  h2UniqueRule,
  headingStructureRule,
} from "./headings.js";
import { httpsRule } from "./https.js";
import { canonicalRule } from "./canonical.js";
import { schemaPresentRule, schemaTypesRule } from "./structured-data.js";
import { robotsTxtRule, sitemapRule } from "./robots.js";
import { renderBlockingRule, lazyLoadingRule } from "./performance.js";
import { imageAltTextRule, imageDensityRule } from "./images.js";
import { lcpRule, fidRule, clsRule, mobileFriendlyRule } from "./vitals.js";
import {
  authorCredentialsRule,
  contactInfoRule,
  duplicateContentRule,
  thinContentFlagRule,
  contentFreshnessRule,
} from "./eeat.js";

/**
 * All scoring rules, in evaluation order (groups: content, meta, technical,
 * media, vitals, eeat). This order breaks ties between recommendations.
 * Total weight: 100 points.
 *
 * Content:    7 + 6 + 1 + 2 + 3 + 1     = 20
 * Meta:       6 + 4 + 4 + 2 + 1 + 1 + 2 = 20
 * Technical:  8 + 4 + 2 + 3 + 2 + 2 + 3 + 1 = 25
 * Media:      7 + 3                 = 10
 * Vitals:     5 + 3 + 3 + 4         = 15
 * E-E-A-T:    2 + 2 + 2 + 2 + 2     = 10
 * ---
 * Total:      100
 */
export const allRules: readonly RuleDefinition[] = [
  contentLengthRule,
  keywordDensityRule,
  keywordCountRule,
  keywordDistributionRule,
  paragraphLengthRule,
  readabilityRule,
  titleLengthRule,
  descriptionLengthRule,
  h1PresentRule,
  h1SingleRule,
  h1H2DistinctRule,
  h2UniqueRule,
  headingStructureRule,
  httpsRule,
  canonicalRule,
  schemaPresentRule,
  schemaTypesRule,
  robotsTxtRule,
  sitemapRule,
  renderBlockingRule,
  lazyLoadingRule,
  imageAltTextRule,
  imageDensityRule,
  lcpRule,
  fidRule,
  clsRule,
  mobileFriendlyRule,
  authorCredentialsRule,
  contactInfoRule,
  duplicateContentRule,
  thinContentFlagRule,
  contentFreshnessRule,
];

export {
  contentLengthRule,
  keywordDensityRule,
  keywordCountRule,
  keywordDistributionRule,
  paragraphLengthRule,
  readabilityRule,
  titleLengthRule,
  descriptionLengthRule,
  h1PresentRule,
  h1SingleRule,
  h1H2DistinctRule,
  h2UniqueRule,
  headingStructureRule,
  httpsRule,
  canonicalRule,
  schemaPresentRule,
  schemaTypesRule,
  robotsTxtRule,
  sitemapRule,
  renderBlockingRule,
  lazyLoadingRule,
  imageAltTextRule,
  imageDensityRule,
  lcpRule,
  fidRule,
  clsRule,
  mobileFriendlyRule,
  authorCredentialsRule,
  contactInfoRule,
  duplicateContentRule,
  thinContentFlagRule,
  contentFreshnessRule,
};
