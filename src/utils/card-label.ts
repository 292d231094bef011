import type { CardRef } from "../types";

/**
 * "name:locale", or just the name for cards without a locale
 */
export function cardLabel(card: CardRef): string {
  return card.locale ? `${card.name}:${card.locale}` : card.name;
}
