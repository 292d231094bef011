import type { BundleMap, Card, CardClass } from "../types";

/**
 * One card per bundle, named after the bundle key
 */
export function createInstances(
  cardClass: CardClass,
  bundles: BundleMap,
  locale: string,
): Card[] {
  return Object.entries(bundles).map(([name, bundle]) => ({
    name,
    locale,
    cardClass,
    bundle,
  }));
}
