/**
 * Asset crawler
 * Groups the files below a directory into per-card bundles
 */

import glob from "fast-glob";
import path from "node:path";
import { isDirectory } from "./file-exists";
import type { BundleMap } from "../types";
import type { Logger } from "./logger";

/**
 * Walk `rootDir` and group its files by base name
 *
 * - Files inside a directory named `animFolder` are frames: the part of the
 *   base name before the `frameRe` match is the bundle key
 * - Every other file is the static image of the bundle named after it
 * - Dot-prefixed files are skipped; dot-prefixed directories are walked
 *
 * Directories are visited top-down, a directory's own files before its
 * subdirectories, and files in lexicographic order within a directory. Frame
 * counters must therefore be zero-padded for frame order to be playback order.
 *
 * Never throws: a missing or unreadable directory yields an empty map.
 */
export async function crawl(
  rootDir: string,
  frameRe: string,
  animFolder: string,
  logger?: Logger,
): Promise<BundleMap> {
  const bundles: BundleMap = {};

  if (!(await isDirectory(rootDir))) {
    logger?.debug(`Nothing to crawl at ${rootDir}`);
    return bundles;
  }

  let files: string[];
  try {
    files = await glob("**/*", {
      cwd: rootDir,
      onlyFiles: true,
      dot: true,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger?.warn(`Could not crawl ${rootDir}: ${message}`);
    return bundles;
  }

  const frameSplitter = new RegExp(frameRe);
  const visible = files.filter((file) => !path.basename(file).startsWith("."));

  for (const relative of visible.sort(walkOrder)) {
    const file = path.resolve(rootDir, relative);
    const directory = path.basename(path.dirname(file));
    const header = path.parse(file).name;

    if (directory === animFolder) {
      const key = header.split(frameSplitter)[0];
      bundles[key] ??= { static: null, animated: [] };
      bundles[key].animated.push(file);
      continue;
    }

    bundles[header] ??= { static: null, animated: [] };
    bundles[header].static ??= file;
  }

  return bundles;
}

/**
 * Top-down walk order for paths relative to the crawl root
 */
function walkOrder(a: string, b: string): number {
  const dirsA = directoriesOf(a);
  const dirsB = directoriesOf(b);
  const shared = Math.min(dirsA.length, dirsB.length);

  for (let i = 0; i < shared; i++) {
    if (dirsA[i] !== dirsB[i]) {
      return compare(dirsA[i], dirsB[i]);
    }
  }

  // A parent's own files come before anything in its subdirectories
  if (dirsA.length !== dirsB.length) {
    return dirsA.length - dirsB.length;
  }

  return compare(path.basename(a), path.basename(b));
}

// fast-glob always reports posix separators
function directoriesOf(file: string): string[] {
  const directory = path.posix.dirname(file);
  return directory === "." ? [] : directory.split("/");
}

function compare(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
