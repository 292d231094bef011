/**
 * Card entity types
 */

import type { CardClass } from "./config";
import type { Stage } from "./pipeline";

/**
 * Files that together represent one card
 * `animated` is in lexicographic order, which is frame order only when
 * frame counters are zero-padded
 */
export interface AssetBundle {
  static: string | null;
  animated: string[];
}

// Bundle key (base name) -> bundle, in discovery order
export type BundleMap = Record<string, AssetBundle>;

// Output kind (e.g. "medium", "icons/large") -> directory
export type OutputPaths = Record<string, string>;

export interface Card {
  name: string;
  locale: string; // Empty for card classes that are not localized
  cardClass: CardClass;
  bundle: AssetBundle;

  // Set by the pipeline when processing starts
  outputPaths?: OutputPaths;
  // Frames fed to the animation encoders (composited copies for cardbacks)
  frames?: string[];
}

export interface CardRef {
  name: string;
  locale: string;
  cardClass: CardClass;
}

/**
 * One catalog variant: how its cards are instantiated and which
 * stages produce their derived assets
 */
export interface CardVariant {
  cardClass: CardClass;
  createInstances(bundles: BundleMap, locale: string): Card[];
  makeStaticVariants(): Stage[];
  makeAnimatedVariants(): Stage[];
}
