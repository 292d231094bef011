import type { Card } from "../types";

/**
 * Directory of one output kind for a card
 * Only valid once processing has resolved the card's output paths
 */
export function getOutputDir(card: Card, kind: string): string {
  if (!card.outputPaths) {
    throw new Error(
      `Output paths of ${card.name} are read before processing started`,
    );
  }
  const dir = card.outputPaths[kind];
  if (dir === undefined) {
    throw new Error(
      `Output kind "${kind}" is not configured for ${card.cardClass}`,
    );
  }
  return dir;
}
