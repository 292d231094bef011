/**
 * External command runner
 * Spawns a tool without a shell and captures its output
 */

import { spawn } from "node:child_process";
import type { CommandResult, ToolCommand } from "../types";

// Exit status a shell reports for a program it cannot find or start
const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * Run a command to completion
 * Never rejects: a process that cannot be spawned resolves with exit code 127
 * and the spawn error as stderr, like a shell would report it
 */
export function runCommand(command: ToolCommand): Promise<CommandResult> {
  return new Promise((resolve) => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const finish = (result: CommandResult): void => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    const child = spawn(command.program, command.args, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    child.stdout.on("data", (data: Buffer) => stdout.push(data));
    child.stderr.on("data", (data: Buffer) => stderr.push(data));

    child.on("error", (error) => {
      finish({
        exitCode: SPAWN_FAILURE_EXIT_CODE,
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: error.message,
      });
    });

    child.on("close", (code) => {
      finish({
        // null when the process was killed by a signal
        exitCode: code ?? 1,
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
      });
    });
  });
}
