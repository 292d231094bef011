/**
 * Scanner Module
 * Discovers asset bundles and instantiates one card per bundle
 */

import path from "node:path";
import { getVariant } from "../cards";
import { crawl } from "../utils";
import type { Card, ConversionContext } from "../types";

/**
 * Crawls every requested card type and populates context
 *
 * Localized card classes are crawled once per configured locale
 * (<input>/<unityFolder>/<locale>), the others once (<input>/<unityFolder>)
 * with an empty locale.
 *
 * Writes to context:
 * - cards: All cards, in card type then locale then discovery order
 */
export async function scan(ctx: ConversionContext): Promise<void> {
  const { config, input, cardTypes, logger, tracker } = ctx;
  const cards: Card[] = [];

  for (const cardClass of cardTypes) {
    const variant = getVariant(cardClass);
    const typeConfig = config.cardTypes[cardClass];
    const root = path.join(input, typeConfig.unityFolder);
    const locales = typeConfig.localized ? config.locale : [""];

    for (const locale of locales) {
      const directory = path.join(root, locale);
      const bundles = await crawl(
        directory,
        typeConfig.frameRe,
        typeConfig.animFolder,
        logger,
      );
      const instances = variant.createInstances(bundles, locale);
      logger.debug(`Found ${instances.length} ${cardClass} in ${directory}`);
      cards.push(...instances);
    }
  }

  ctx.cards = cards;
  tracker.setTotalCards(cards.length);
}
