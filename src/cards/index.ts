/**
 * Card variants
 */

import { cardsVariant } from "./cards";
import { heroesVariant } from "./heroes";
import { cardbacksVariant } from "./cardbacks";
import type { CardClass, CardVariant } from "../types";

// Export individual variants
export { cardsVariant, heroesVariant, cardbacksVariant };
export { createInstances } from "./create-instances";

// Variant registry by card class
const variants: Record<CardClass, CardVariant> = {
  cards: cardsVariant,
  heroes: heroesVariant,
  cardbacks: cardbacksVariant,
};

/**
 * Get the variant for a card class
 */
export function getVariant(cardClass: CardClass): CardVariant {
  return variants[cardClass];
}
