/**
 * Converter - Run orchestrator
 * Coordinates scanning and processing with zero business logic
 */

import * as modules from "./modules";
import { Logger, Tracker, getBackgroundsDir, runCommand } from "./utils";
import type {
  CardClass,
  CardConvertConfig,
  CommandRunner,
  ConversionContext,
  PipelineResult,
} from "./types";

export interface ConverterOptions {
  logger?: Logger;
  tracker?: Tracker;
  runner?: CommandRunner;
  backgroundsDir?: string;
  verbose?: boolean;
  onProgress?: (done: number, total: number) => void;
}

export interface RunRequest {
  cardTypes: CardClass[];
  input: string;
  output: string;
  workers?: number;
}

/**
 * Build the context shared by every module of one run
 */
export function createContext(
  config: CardConvertConfig,
  request: RunRequest,
  options: ConverterOptions = {},
): ConversionContext {
  return {
    config,
    cardTypes: request.cardTypes,
    input: request.input,
    output: request.output,
    workers: request.workers,
    backgroundsDir: options.backgroundsDir ?? getBackgroundsDir(),
    verbose: options.verbose,
    onProgress: options.onProgress,
    tracker: options.tracker ?? new Tracker(),
    logger: options.logger ?? new Logger(config.logging.level),
    runner: options.runner ?? runCommand,
  };
}

export class Converter {
  constructor(
    private config: CardConvertConfig,
    private options: ConverterOptions = {},
  ) {}

  /**
   * Convert every card of the requested types
   * Resolves with one result per card, in submission order, even when cards fail
   */
  async run(
    cardTypes: CardClass[],
    input: string,
    output: string,
    workers?: number,
  ): Promise<PipelineResult[]> {
    const ctx = createContext(
      this.config,
      { cardTypes, input, output, workers },
      this.options,
    );

    await modules.scan(ctx);
    await modules.process(ctx);

    return ctx.results ?? [];
  }
}
