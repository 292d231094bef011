import { createInstances } from "./create-instances";
import { stages } from "../pipeline";
import type { CardVariant } from "../types";

/**
 * Hero portraits
 * Static only: frames found next to a hero are ignored
 */
export const heroesVariant: CardVariant = {
  cardClass: "heroes",

  createInstances(bundles, locale) {
    return createInstances("heroes", bundles, locale);
  },

  makeStaticVariants() {
    return [stages.mediumCopy, stages.smallCopy, stages.jpgCopy];
  },

  makeAnimatedVariants() {
    return [];
  },
};
