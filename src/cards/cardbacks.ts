import { createInstances } from "./create-instances";
import { stages } from "../pipeline";
import type { CardVariant } from "../types";

/**
 * Card backs
 * Animation frames are transparent, so they are laid over a background
 * before any animated format is built
 */
export const cardbacksVariant: CardVariant = {
  cardClass: "cardbacks",

  createInstances(bundles, locale) {
    return createInstances("cardbacks", bundles, locale);
  },

  makeStaticVariants() {
    return [stages.mediumCopy, stages.smallCopy, stages.jpgCopy];
  },

  makeAnimatedVariants() {
    return [
      stages.compositeFrames,
      stages.animatedContainer,
      stages.animatedLoop,
      stages.mp4Encode,
      stages.webmEncode,
    ];
  },
};
