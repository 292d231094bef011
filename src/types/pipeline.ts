/**
 * Pipeline data types
 */

import type { CardConvertConfig } from "./config";
import type { Card, CardRef } from "./cards";
import type { Logger } from "../utils/logger";
import type { PipelineError } from "../pipeline/errors";

// ============================================================================
// External Commands
// ============================================================================

export interface ToolCommand {
  program: string;
  args: string[];
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: ToolCommand) => Promise<CommandResult>;

// ============================================================================
// Stages
// ============================================================================

export type ToolStageName =
  | "medium-copy"
  | "small-copy"
  | "jpg-copy"
  | "small-icon"
  | "medium-icon"
  | "large-icon"
  | "animated-container"
  | "animated-loop"
  | "mp4-encode"
  | "webm-encode"
  | "composite";

export type PipelineStage =
  | ToolStageName
  | "missing-static"
  | "output-folders"
  | "copy-original"
  | "unknown";

/**
 * Everything a stage needs besides the card it works on
 */
export interface StageContext {
  config: CardConvertConfig;
  runner: CommandRunner;
  logger: Logger;
  outputDir: string;
  backgroundsDir: string;
}

export interface Stage {
  name: ToolStageName;
  run(card: Card, ctx: StageContext): Promise<void>;
}

// ============================================================================
// Results
// ============================================================================

export type PipelineResult =
  | { status: "success"; card: CardRef; message: string }
  | { status: "failed"; card: CardRef; error: PipelineError };
