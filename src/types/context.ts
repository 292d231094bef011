/**
 * Conversion context - flows through the entire run
 * Each module reads what it needs and writes its results back
 */

import type { CardClass, CardConvertConfig } from "./config";
import type { Card } from "./cards";
import type { CommandRunner, PipelineResult } from "./pipeline";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  CardIssue,
  ResourceIssue,
  ResourceIssueReason,
  ProcessingStats,
} from "../utils/tracker";

export interface ConversionContext {
  // Input - provided at initialization
  config: CardConvertConfig;
  cardTypes: CardClass[];
  input: string;
  output: string;
  workers?: number; // Defaults to config.processes
  backgroundsDir: string;
  verbose?: boolean;
  onProgress?: (done: number, total: number) => void;

  // Run-scoped collaborators
  tracker: Tracker;
  logger: Logger;
  runner: CommandRunner;

  cards?: Card[]; // Written by scanner
  results?: PipelineResult[]; // Written by processor, one per card in submission order
}
