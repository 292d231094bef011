/**
 * Card pipeline
 * Output folders -> original copy -> static variants -> animation variants
 * Stages run one after another; the first failure ends the card
 */

import path from "node:path";
import { copyFile, mkdir } from "fs/promises";
import { PipelineError } from "./errors";
import { cardLabel, getOutputDir } from "../utils";
import type {
  Card,
  CardVariant,
  OutputPaths,
  PipelineStage,
  Stage,
  StageContext,
} from "../types";

/**
 * Run `fn`, re-throwing anything that is not already a PipelineError
 * as a failure of `stage`
 */
async function guard(
  stage: PipelineStage,
  card: Card,
  fn: () => Promise<void>,
): Promise<void> {
  try {
    await fn();
  } catch (error) {
    if (error instanceof PipelineError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new PipelineError(stage, cardLabel(card), message, { cause: error });
  }
}

/**
 * Create <output>/<cardClass>/<locale>/<kind> for every configured kind
 * and record them on the card
 */
async function makeOutputFolders(card: Card, ctx: StageContext): Promise<void> {
  ctx.logger.info(`CREATING OUTPUT FOLDERS:: ${cardLabel(card)}`);
  if (card.outputPaths) {
    throw new Error(`${cardLabel(card)} has already been processed`);
  }

  const { outputs } = ctx.config.cardTypes[card.cardClass];
  const outputPaths: OutputPaths = {};

  for (const kind of outputs) {
    const dir = path.join(ctx.outputDir, card.cardClass, card.locale, kind);
    ctx.logger.debug(`Creating folder: ${dir}`);
    // An existing directory is fine; a file in the way or a permission
    // problem rejects
    await mkdir(dir, { recursive: true });
    outputPaths[kind] = dir;
  }

  card.outputPaths = outputPaths;
}

async function copyOriginal(
  card: Card,
  staticFile: string,
  ctx: StageContext,
): Promise<void> {
  ctx.logger.info(`COPYING ORIGINALS:: ${cardLabel(card)}`);
  const output = path.join(
    getOutputDir(card, "original"),
    path.basename(staticFile),
  );
  await copyFile(staticFile, output);
  ctx.logger.debug(`Copied ${staticFile} ---> ${output}`);
}

async function runStages(
  stages: Stage[],
  card: Card,
  ctx: StageContext,
): Promise<void> {
  for (const stage of stages) {
    await guard(stage.name, card, () => stage.run(card, ctx));
  }
}

/**
 * Process one card start to finish
 * Returns a completion message; throws a PipelineError naming the failed stage
 */
export async function processCard(
  card: Card,
  variant: CardVariant,
  ctx: StageContext,
): Promise<string> {
  const label = cardLabel(card);
  ctx.logger.info(`PROCESSING:: ${label}`);

  const staticFile = card.bundle.static;
  if (!staticFile) {
    throw new PipelineError(
      "missing-static",
      label,
      `${label} has animation frames but no static image`,
    );
  }

  await guard("output-folders", card, () => makeOutputFolders(card, ctx));
  await guard("copy-original", card, () =>
    copyOriginal(card, staticFile, ctx),
  );

  await runStages(variant.makeStaticVariants(), card, ctx);

  if (card.bundle.animated.length === 0) {
    ctx.logger.info(`No animation for ${label}`);
  } else {
    card.frames = [...card.bundle.animated];
    await runStages(variant.makeAnimatedVariants(), card, ctx);
  }

  return `Finished processing ${label}`;
}
