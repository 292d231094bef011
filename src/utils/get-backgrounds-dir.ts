import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Folder holding composite backgrounds
 * $BACKGROUNDS_FOLDER wins; otherwise the backgrounds/ folder of the install
 */
export function getBackgroundsDir(
  env: NodeJS.ProcessEnv = process.env,
): string {
  const override = env.BACKGROUNDS_FOLDER;
  if (override) {
    return override;
  }
  return path.join(__dirname, "..", "..", "backgrounds");
}
