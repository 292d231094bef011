/**
 * Processor Module
 * Runs every card's pipeline on a bounded pool and collects one result per card
 */

import pLimit from "p-limit";
import { getVariant } from "../cards";
import { PipelineError, processCard } from "../pipeline";
import { cardLabel } from "../utils";
import type {
  Card,
  CardRef,
  ConversionContext,
  PipelineResult,
  StageContext,
} from "../types";

function toRef(card: Card): CardRef {
  return { name: card.name, locale: card.locale, cardClass: card.cardClass };
}

/**
 * One unit of work: a card's whole pipeline
 * Never rejects - failures come back as the card's result
 */
async function runUnit(card: Card, ctx: StageContext): Promise<PipelineResult> {
  const ref = toRef(card);
  try {
    const message = await processCard(card, getVariant(card.cardClass), ctx);
    ctx.logger.info(message);
    return { status: "success", card: ref, message };
  } catch (error) {
    const failure =
      error instanceof PipelineError
        ? error
        : new PipelineError(
            "unknown",
            cardLabel(ref),
            error instanceof Error ? error.message : String(error),
            { cause: error },
          );
    ctx.logger.error(`${cardLabel(ref)} failed at ${failure.stage}: ${failure.message}`);
    return { status: "failed", card: ref, error: failure };
  }
}

/**
 * Processes all scanned cards
 *
 * Writes to context:
 * - results: One result per card, in the order the cards were submitted
 */
export async function process(ctx: ConversionContext): Promise<void> {
  const { config, cards, tracker, logger, onProgress } = ctx;
  if (!cards) {
    throw new Error("Scanner must run before processor");
  }

  // 0 or unset means the configured pool size
  const workers = ctx.workers || config.processes;
  const limit = pLimit(workers);

  const stageCtx: StageContext = {
    config,
    runner: ctx.runner,
    logger,
    outputDir: ctx.output,
    backgroundsDir: ctx.backgroundsDir,
  };

  logger.debug(`Processing ${cards.length} cards with ${workers} workers`);

  let done = 0;
  const units = cards.map((card) =>
    limit(async () => {
      const result = await runUnit(card, stageCtx);
      onProgress?.(++done, cards.length);
      return result;
    }),
  );

  // Promise.all keeps submission order regardless of completion order
  const results = await Promise.all(units);
  for (const result of results) {
    tracker.trackResult(result);
  }
  ctx.results = results;
}
