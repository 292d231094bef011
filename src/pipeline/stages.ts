/**
 * Pipeline stages
 * Each stage runs external tools to produce one derived artifact of a card
 */

import path from "node:path";
import { rm } from "fs/promises";
import { ToolError } from "./errors";
import {
  GEOMETRY,
  animatedContainerCommand,
  animatedLoopCommand,
  compositeCommand,
  framePattern,
  jpgCopyCommand,
  mp4Command,
  resizeCommand,
  webmCommand,
  withExtension,
} from "./commands";
import { cardLabel, formatCommand, getOutputDir } from "../utils";
import type {
  Card,
  Stage,
  StageContext,
  ToolCommand,
  ToolStageName,
} from "../types";

// ============================================================================
// Helpers
// ============================================================================

/**
 * Run one tool invocation, throwing a ToolError for a non-zero exit status
 */
async function execute(
  stage: ToolStageName,
  card: Card,
  command: ToolCommand,
  ctx: StageContext,
): Promise<void> {
  const line = formatCommand(command);
  ctx.logger.debug(`Executing: ${line}`);

  const { exitCode, stdout, stderr } = await ctx.runner(command);
  if (exitCode !== 0) {
    throw new ToolError(stage, cardLabel(card), line, exitCode, stdout, stderr);
  }
}

function requireStatic(card: Card): string {
  if (!card.bundle.static) {
    throw new Error(`${cardLabel(card)} has no static image`);
  }
  return card.bundle.static;
}

/**
 * Source image and the same file name inside an output kind
 */
function inputOutput(card: Card, kind: string): [string, string] {
  const input = requireStatic(card);
  return [input, path.join(getOutputDir(card, kind), path.basename(input))];
}

function framesOf(card: Card): string[] {
  return card.frames ?? card.bundle.animated;
}

// ============================================================================
// Static variants
// ============================================================================

function resizeStage(
  name: ToolStageName,
  title: string,
  kind: string,
  geometry: string,
): Stage {
  return {
    name,
    async run(card, ctx) {
      ctx.logger.info(`CREATING ${title}:: ${cardLabel(card)}`);
      const [input, output] = inputOutput(card, kind);
      await execute(name, card, resizeCommand(input, output, geometry), ctx);
    },
  };
}

export const mediumCopy = resizeStage(
  "medium-copy",
  "MEDIUM SIZED COPY",
  "medium",
  GEOMETRY.medium,
);

export const smallCopy = resizeStage(
  "small-copy",
  "SMALL SIZED COPY",
  "small",
  GEOMETRY.small,
);

export const smallIcon = resizeStage(
  "small-icon",
  "SMALL SIZED ICON",
  "icons/small",
  GEOMETRY.smallIcon,
);

export const mediumIcon = resizeStage(
  "medium-icon",
  "MEDIUM SIZED ICON",
  "icons/medium",
  GEOMETRY.mediumIcon,
);

export const largeIcon = resizeStage(
  "large-icon",
  "LARGE SIZED ICON",
  "icons/large",
  GEOMETRY.largeIcon,
);

export const jpgCopy: Stage = {
  name: "jpg-copy",
  async run(card, ctx) {
    ctx.logger.info(`CREATING MEDIUM SIZED JPG COPY:: ${cardLabel(card)}`);
    const [input, output] = inputOutput(card, "mediumj");
    await execute(
      "jpg-copy",
      card,
      jpgCopyCommand(input, withExtension(output, "jpg")),
      ctx,
    );
  },
};

// ============================================================================
// Animation variants
// ============================================================================

export const animatedContainer: Stage = {
  name: "animated-container",
  async run(card, ctx) {
    ctx.logger.info(`CREATING ANIMATED PNG:: ${cardLabel(card)}`);
    const [, output] = inputOutput(card, "animated");
    await execute(
      "animated-container",
      card,
      animatedContainerCommand(output, framesOf(card)),
      ctx,
    );
  },
};

/**
 * Turns the animated PNG into a GIF, then removes the PNG
 */
export const animatedLoop: Stage = {
  name: "animated-loop",
  async run(card, ctx) {
    ctx.logger.info(`CREATING ANIMATED GIF:: ${cardLabel(card)}`);
    const [, container] = inputOutput(card, "animated");
    await execute(
      "animated-loop",
      card,
      animatedLoopCommand(container, withExtension(container, "gif")),
      ctx,
    );
    ctx.logger.debug(`Removing input png file: ${container}`);
    await rm(container);
  },
};

/**
 * Web encodes read the frame sequence directly, not the animated PNG
 */
function webStage(
  name: ToolStageName,
  title: string,
  ext: string,
  build: (pattern: string, output: string) => ToolCommand,
): Stage {
  return {
    name,
    async run(card, ctx) {
      ctx.logger.info(`CREATING ${title}:: ${cardLabel(card)}`);
      const frames = framesOf(card);
      if (frames.length === 0) {
        throw new Error(`${cardLabel(card)} has no animation frames`);
      }
      const { frameRe } = ctx.config.cardTypes[card.cardClass];
      const [, output] = inputOutput(card, "animated");
      await execute(
        name,
        card,
        build(framePattern(frames[0], frameRe), withExtension(output, ext)),
        ctx,
      );
    },
  };
}

export const mp4Encode = webStage("mp4-encode", "MP4", "mp4", mp4Command);

export const webmEncode = webStage("webm-encode", "WEBM", "webm", webmCommand);

/**
 * Lays every frame over the class's background image
 * The composited copies (ff_<frame>) replace the frames for later stages
 */
export const compositeFrames: Stage = {
  name: "composite",
  async run(card, ctx) {
    ctx.logger.info(`COMPOSITING ANIMATION FRAMES:: ${cardLabel(card)}`);
    const { composite } = ctx.config.cardTypes[card.cardClass];
    if (!composite) {
      throw new Error(`No composite background configured for ${card.cardClass}`);
    }
    const background = path.join(ctx.backgroundsDir, composite);
    const tempDir = getOutputDir(card, "animation_temp");

    const composited: string[] = [];
    for (const frame of framesOf(card)) {
      const output = path.join(tempDir, `ff_${path.basename(frame)}`);
      await execute("composite", card, compositeCommand(background, frame, output), ctx);
      composited.push(output);
    }
    card.frames = composited;
  },
};
