import { createInstances } from "./create-instances";
import { stages } from "../pipeline";
import type { CardVariant } from "../types";

/**
 * Collectible cards
 * Full set of copies and icons; animated cards also get GIF, MP4 and WebM
 */
export const cardsVariant: CardVariant = {
  cardClass: "cards",

  createInstances(bundles, locale) {
    return createInstances("cards", bundles, locale);
  },

  makeStaticVariants() {
    return [
      stages.mediumCopy,
      stages.smallCopy,
      stages.jpgCopy,
      stages.smallIcon,
      stages.mediumIcon,
      stages.largeIcon,
    ];
  },

  makeAnimatedVariants() {
    return [
      stages.animatedContainer,
      stages.animatedLoop,
      stages.mp4Encode,
      stages.webmEncode,
    ];
  },
};
