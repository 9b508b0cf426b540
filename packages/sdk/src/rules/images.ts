import type { RuleDefinition, SEORecord, RuleCheckResult } from "../types.js";

/** Fewer words than this per image reads as an image-heavy page */
export const MIN_WORDS_PER_IMAGE = 50;
/** Pages with this many images or fewer are never flagged as image-heavy */
const IMAGE_DENSITY_ALLOWANCE = 3;

export const imageAltTextRule: RuleDefinition = {
  id: "image-alt",
  name: "Image Alt Text",
  group: "media",
  description: "All images should have descriptive alt text for accessibility and SEO",
  weight: 7,
  check(record: SEORecord): RuleCheckResult {
    const total = record.imagesCount;
    const missing = record.missingAltImagesCount;

    if (total === 0 || missing === 0) {
      return { status: "pass" };
    }

    return {
      status: "fail",
      deduction: Math.max(1, Math.round((7 * missing) / total)),
      message: `${missing} of ${total} images are missing alt text. Add descriptive alt attributes to every image.`,
    };
  },
};

export const imageDensityRule: RuleDefinition = {
  id: "image-density",
  name: "Image Density",
  group: "media",
  description: "Image count should stay proportionate to the amount of text",
  weight: 3,
  check(record: SEORecord): RuleCheckResult {
    const images = record.imagesCount;
    if (images <= IMAGE_DENSITY_ALLOWANCE || images <= record.wordCount / MIN_WORDS_PER_IMAGE) {
      return { status: "pass" };
    }
    return {
      status: "fail",
      deduction: 3,
      message: `${images} images for ${record.wordCount} words may slow the page down. Compress images and remove non-essential ones.`,
    };
  },
};
