import type { ToolCommand } from "../types";

/**
 * Render a command as a single shell-like line for logs and error reports
 * Arguments containing whitespace, quotes or "#" are double-quoted
 */
export function formatCommand(command: ToolCommand): string {
  return [command.program, ...command.args]
    .map((part) => (/[\s"'#]/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}
