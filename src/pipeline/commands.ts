/**
 * External tool command builders
 * Parameters are fixed so that every run produces identical assets
 */

import path from "node:path";
import type { ToolCommand } from "../types";

const RESIZE_FILTER = ["-filter", "lanczos"];
const UNSHARP = ["-unsharp", "1.5x1+0.7+0.02"];

export const JPG_BACKGROUND = "#242424";
export const JPG_QUALITY = "85%";
export const FRAME_RATE = "11";

export const GEOMETRY = {
  medium: "200x303",
  small: "123x186",
  jpgCrop: "200x302+0+0",
  smallIcon: "11x16",
  mediumIcon: "30x44",
  largeIcon: "40x60",
} as const;

/**
 * Lanczos resize followed by the shared unsharp mask
 */
export function resizeCommand(
  input: string,
  output: string,
  geometry: string,
): ToolCommand {
  return {
    program: "convert",
    args: [input, ...RESIZE_FILTER, "-resize", geometry, ...UNSHARP, output],
  };
}

/**
 * Flatten onto the dark background, resize, drop the bottom row and encode as JPEG
 */
export function jpgCopyCommand(input: string, output: string): ToolCommand {
  return {
    program: "convert",
    args: [
      input,
      "-background",
      JPG_BACKGROUND,
      "-layers",
      "flatten",
      ...RESIZE_FILTER,
      "-resize",
      GEOMETRY.medium,
      "+repage",
      "-gravity",
      "south",
      "-crop",
      GEOMETRY.jpgCrop,
      "+repage",
      ...UNSHARP,
      "-quality",
      JPG_QUALITY,
      output,
    ],
  };
}

/**
 * Lay a frame over the background; the result takes the background's size
 */
export function compositeCommand(
  background: string,
  frame: string,
  output: string,
): ToolCommand {
  return {
    program: "convert",
    args: [background, frame, "-gravity", "center", "-composite", output],
  };
}

/**
 * Pack frames, in order, into one animated PNG
 */
export function animatedContainerCommand(
  output: string,
  frames: string[],
): ToolCommand {
  return { program: "apngasm", args: [output, ...frames] };
}

/**
 * Convert an animated PNG into a looping GIF
 */
export function animatedLoopCommand(
  input: string,
  output: string,
): ToolCommand {
  return { program: "apng2gif", args: [input, output] };
}

/**
 * Baseline H.264 encode; `-y` replaces the encode of an earlier run
 */
export function mp4Command(framePattern: string, output: string): ToolCommand {
  return {
    program: "ffmpeg",
    args: [
      "-y",
      "-f",
      "image2",
      "-framerate",
      FRAME_RATE,
      "-i",
      framePattern,
      "-profile:v",
      "baseline",
      "-level",
      "3.0",
      "-pix_fmt",
      "yuv420p",
      output,
    ],
  };
}

export function webmCommand(framePattern: string, output: string): ToolCommand {
  return {
    program: "ffmpeg",
    args: [
      "-y",
      "-f",
      "image2",
      "-framerate",
      FRAME_RATE,
      "-i",
      framePattern,
      output,
    ],
  };
}

// ============================================================================
// Path helpers
// ============================================================================

/**
 * Replace the extension of a path (`ext` without the dot)
 */
export function withExtension(file: string, ext: string): string {
  const { dir, name } = path.parse(file);
  return path.join(dir, `${name}.${ext}`);
}

/**
 * Turn a frame path into a printf-style sequence pattern for ffmpeg
 * The digits matched by `frameRe` become a zero-padded placeholder of the
 * same width: "/x/A_0001.png" with "_\d{4}$" gives "/x/A_%04d.png"
 */
export function framePattern(frame: string, frameRe: string): string {
  const { dir, name, ext } = path.parse(frame);
  const pattern = name.replace(new RegExp(frameRe), (match) =>
    /\d+/.test(match)
      ? match.replace(/\d+/, (digits) => `%0${digits.length}d`)
      : "_%04d",
  );
  return path.join(dir, `${pattern}${ext}`);
}
