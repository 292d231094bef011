/**
 * Shared test helpers
 */

import { mkdtemp, mkdir, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { Logger } from "../utils/logger";
import type {
  CardConvertConfig,
  CommandResult,
  CommandRunner,
  StageContext,
  ToolCommand,
} from "../types";

export function createTestConfig(): CardConvertConfig {
  return {
    cardTypes: {
      cards: {
        frameRe: "_\\d{4}$",
        animFolder: "animated",
        outputs: [
          "original",
          "medium",
          "small",
          "mediumj",
          "icons/small",
          "icons/medium",
          "icons/large",
          "animated",
        ],
        unityFolder: "Cards",
        localized: true,
      },
      heroes: {
        frameRe: "_\\d{4}$",
        animFolder: "animated",
        outputs: ["original", "medium", "small", "mediumj"],
        unityFolder: "Heroes",
        localized: false,
      },
      cardbacks: {
        frameRe: "_\\d{4}$",
        animFolder: "animated",
        outputs: [
          "original",
          "medium",
          "small",
          "mediumj",
          "animated",
          "animation_temp",
        ],
        composite: "bg.png",
        unityFolder: "CardBacks",
        localized: false,
      },
    },
    locale: ["enUS"],
    processes: 2,
    logging: { level: "error" },
  };
}

/**
 * Path a fake tool invocation writes to
 */
function outputOf(command: ToolCommand): string {
  return command.program === "apngasm"
    ? command.args[0]
    : command.args[command.args.length - 1];
}

export interface FakeRunner {
  runner: CommandRunner;
  calls: ToolCommand[];
}

/**
 * Stand-in for the external tools
 * Records every command and writes an empty output file on success;
 * `exitCodeFor` decides which commands fail
 */
export function createFakeRunner(
  exitCodeFor: (command: ToolCommand) => number = () => 0,
  delayFor: (command: ToolCommand) => number = () => 0,
): FakeRunner {
  const calls: ToolCommand[] = [];

  const runner: CommandRunner = async (command): Promise<CommandResult> => {
    calls.push(command);
    const delay = delayFor(command);
    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }

    const exitCode = exitCodeFor(command);
    if (exitCode !== 0) {
      return { exitCode, stdout: "", stderr: `${command.program} failed` };
    }

    await writeFile(outputOf(command), "");
    return { exitCode: 0, stdout: "", stderr: "" };
  };

  return { runner, calls };
}

export function createStageContext(
  runner: CommandRunner,
  outputDir: string,
  backgroundsDir: string = "/backgrounds",
): StageContext {
  return {
    config: createTestConfig(),
    runner,
    logger: new Logger("error"),
    outputDir,
    backgroundsDir,
  };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), "cardconvert-"));
}

/**
 * Create empty files (and their folders) below `root`
 */
export async function touch(root: string, ...files: string[]): Promise<void> {
  for (const file of files) {
    const fullPath = path.join(root, file);
    await mkdir(path.dirname(fullPath), { recursive: true });
    await writeFile(fullPath, "");
  }
}
