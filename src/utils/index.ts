/**
 * Utility exports
 */

// Card utilities
export { cardLabel } from "./card-label";
export { getOutputDir } from "./get-output-dir";

// Filesystem utilities
export { fileExists, isDirectory } from "./file-exists";
export { crawl } from "./crawl";
export { getBackgroundsDir } from "./get-backgrounds-dir";

// Process utilities
export { runCommand } from "./run-command";
export { formatCommand } from "./format-command";

// Config utilities
export {
  loadConfig,
  mergeConfig,
  getUserConfigPath,
  loadDefaultConfig,
} from "./load-config";
export type { LoadConfigOptions } from "./load-config";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
