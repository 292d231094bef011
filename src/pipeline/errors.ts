/**
 * Pipeline errors
 * Every failure inside a card's pipeline surfaces as a PipelineError
 * naming the stage that failed
 */

import type { PipelineStage, ToolStageName } from "../types";

export class PipelineError extends Error {
  readonly stage: PipelineStage;
  readonly card: string;

  constructor(
    stage: PipelineStage,
    card: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PipelineError";
    this.stage = stage;
    this.card = card;
  }
}

/**
 * An external tool exited with a non-zero status
 */
export class ToolError extends PipelineError {
  readonly command: string;
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    stage: ToolStageName,
    card: string,
    command: string,
    exitCode: number,
    stdout: string,
    stderr: string,
  ) {
    super(stage, card, `${stage} failed for ${card} (exit code ${exitCode})`);
    this.name = "ToolError";
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }

  override toString(): string {
    return [
      this.message,
      `Command: ${this.command}`,
      `Return Code: ${this.exitCode}`,
      `STDOUT: ${this.stdout}`,
      `STDERR: ${this.stderr}`,
    ].join("\n");
  }
}
