import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { readdir, rm, stat, writeFile, mkdir } from "fs/promises";
import path from "node:path";
import { processCard } from "./process-card";
import { PipelineError, ToolError } from "./errors";
import { GEOMETRY } from "./commands";
import { cardbacksVariant, cardsVariant, heroesVariant } from "../cards";
import { getOutputDir } from "../utils";
import {
  createFakeRunner,
  createStageContext,
  makeTempDir,
  touch,
} from "../test/helpers";
import type { Card, CardClass, ToolCommand } from "../types";

function lastArg(command: ToolCommand): string {
  return command.args[command.args.length - 1];
}

describe("processCard", () => {
  let root: string;
  let input: string;
  let output: string;

  beforeEach(async () => {
    root = await makeTempDir();
    input = path.join(root, "in");
    output = path.join(root, "out");
    await touch(input, "A.png");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function makeCard(
    cardClass: CardClass,
    locale: string,
    frames: string[] = [],
  ): Card {
    return {
      name: "A",
      locale,
      cardClass,
      bundle: {
        static: path.join(input, "A.png"),
        animated: frames.map((frame) => path.join(input, "animated", frame)),
      },
    };
  }

  // ==========================================================================
  // Static variants
  // ==========================================================================
  describe("static cards", () => {
    it("creates every static variant and skips animation", async () => {
      const { runner, calls } = createFakeRunner();
      const ctx = createStageContext(runner, output);

      const message = await processCard(makeCard("cards", "enUS"), cardsVariant, ctx);

      const base = path.join(output, "cards", "enUS");
      expect(message).toBe("Finished processing A:enUS");
      expect(calls.map((c) => c.program)).toEqual(Array(6).fill("convert"));
      expect(calls.map(lastArg)).toEqual([
        path.join(base, "medium", "A.png"),
        path.join(base, "small", "A.png"),
        path.join(base, "mediumj", "A.jpg"),
        path.join(base, "icons", "small", "A.png"),
        path.join(base, "icons", "medium", "A.png"),
        path.join(base, "icons", "large", "A.png"),
      ]);
    });

    it("copies the original and creates every output folder", async () => {
      const { runner } = createFakeRunner();
      const ctx = createStageContext(runner, output);

      await processCard(makeCard("cards", "enUS"), cardsVariant, ctx);

      const base = path.join(output, "cards", "enUS");
      expect(await readdir(path.join(base, "original"))).toEqual(["A.png"]);
      expect((await stat(path.join(base, "animated"))).isDirectory()).toBe(true);
      expect((await readdir(path.join(base, "icons"))).sort()).toEqual([
        "large",
        "medium",
        "small",
      ]);
    });

    it("uses the resize geometries in order", async () => {
      const { runner, calls } = createFakeRunner();
      const ctx = createStageContext(runner, output);

      await processCard(makeCard("cards", "enUS"), cardsVariant, ctx);

      const resizes = calls.map((c) => c.args[c.args.indexOf("-resize") + 1]);
      expect(resizes).toEqual([
        GEOMETRY.medium,
        GEOMETRY.small,
        GEOMETRY.medium,
        GEOMETRY.smallIcon,
        GEOMETRY.mediumIcon,
        GEOMETRY.largeIcon,
      ]);
    });

    it("succeeds again over existing output folders", async () => {
      const first = createFakeRunner();
      const second = createFakeRunner();

      const firstMessage = await processCard(
        makeCard("cards", "enUS"),
        cardsVariant,
        createStageContext(first.runner, output),
      );
      const secondMessage = await processCard(
        makeCard("cards", "enUS"),
        cardsVariant,
        createStageContext(second.runner, output),
      );

      expect(secondMessage).toBe(firstMessage);
      expect(second.calls).toEqual(first.calls);
    });

    it("writes non-localized cards without a locale folder", async () => {
      const { runner, calls } = createFakeRunner();
      const ctx = createStageContext(runner, output);

      const message = await processCard(makeCard("heroes", ""), heroesVariant, ctx);

      expect(message).toBe("Finished processing A");
      expect(lastArg(calls[0])).toBe(path.join(output, "heroes", "medium", "A.png"));
    });
  });

  // ==========================================================================
  // Animation variants
  // ==========================================================================
  describe("animated cards", () => {
    it("builds the gif, mp4 and webm from the frames", async () => {
      const { runner, calls } = createFakeRunner();
      const ctx = createStageContext(runner, output);
      const card = makeCard("cards", "enUS", ["A_0001.png", "A_0002.png"]);

      await processCard(card, cardsVariant, ctx);

      const animated = path.join(output, "cards", "enUS", "animated");
      const pattern = path.join(input, "animated", "A_%04d.png");
      expect(calls.slice(6)).toEqual([
        {
          program: "apngasm",
          args: [
            path.join(animated, "A.png"),
            path.join(input, "animated", "A_0001.png"),
            path.join(input, "animated", "A_0002.png"),
          ],
        },
        {
          program: "apng2gif",
          args: [path.join(animated, "A.png"), path.join(animated, "A.gif")],
        },
        {
          program: "ffmpeg",
          args: [
            "-y",
            "-f",
            "image2",
            "-framerate",
            "11",
            "-i",
            pattern,
            "-profile:v",
            "baseline",
            "-level",
            "3.0",
            "-pix_fmt",
            "yuv420p",
            path.join(animated, "A.mp4"),
          ],
        },
        {
          program: "ffmpeg",
          args: [
            "-y",
            "-f",
            "image2",
            "-framerate",
            "11",
            "-i",
            pattern,
            path.join(animated, "A.webm"),
          ],
        },
      ]);
    });

    it("removes the intermediate animated png", async () => {
      const { runner } = createFakeRunner();
      const ctx = createStageContext(runner, output);
      const card = makeCard("cards", "enUS", ["A_0001.png"]);

      await processCard(card, cardsVariant, ctx);

      const animated = path.join(output, "cards", "enUS", "animated");
      expect((await readdir(animated)).sort()).toEqual([
        "A.gif",
        "A.mp4",
        "A.webm",
      ]);
    });

    it("composites cardback frames before encoding", async () => {
      const { runner, calls } = createFakeRunner();
      const ctx = createStageContext(runner, output, "/backgrounds");
      const card = makeCard("cardbacks", "", ["A_0001.png", "A_0002.png"]);

      await processCard(card, cardbacksVariant, ctx);

      const temp = path.join(output, "cardbacks", "animation_temp");
      const composited = [
        path.join(temp, "ff_A_0001.png"),
        path.join(temp, "ff_A_0002.png"),
      ];
      expect(calls.slice(3, 5)).toEqual([
        {
          program: "convert",
          args: [
            "/backgrounds/bg.png",
            path.join(input, "animated", "A_0001.png"),
            "-gravity",
            "center",
            "-composite",
            composited[0],
          ],
        },
        {
          program: "convert",
          args: [
            "/backgrounds/bg.png",
            path.join(input, "animated", "A_0002.png"),
            "-gravity",
            "center",
            "-composite",
            composited[1],
          ],
        },
      ]);
      expect(calls[5].program).toBe("apngasm");
      expect(calls[5].args.slice(1)).toEqual(composited);
      expect(calls[7].args[5]).toBe(path.join(temp, "ff_A_%04d.png"));
      expect(card.frames).toEqual(composited);
    });

    it("never animates heroes", async () => {
      const { runner, calls } = createFakeRunner();
      const ctx = createStageContext(runner, output);

      await processCard(makeCard("heroes", "", ["A_0001.png"]), heroesVariant, ctx);

      expect(calls.map((c) => c.program)).toEqual(["convert", "convert", "convert"]);
    });
  });

  // ==========================================================================
  // Failures
  // ==========================================================================
  describe("failures", () => {
    it("stops at a failing medium copy with its exit code and stderr", async () => {
      const { runner, calls } = createFakeRunner((command) =>
        lastArg(command).includes(`${path.sep}medium${path.sep}`) ? 2 : 0,
      );
      const ctx = createStageContext(runner, output);
      const card = makeCard("cards", "enUS", ["A_0001.png"]);

      const error = await processCard(card, cardsVariant, ctx).catch(
        (e: unknown) => e,
      );

      expect(error).toBeInstanceOf(ToolError);
      expect(error).toMatchObject({
        stage: "medium-copy",
        card: "A:enUS",
        exitCode: 2,
        stdout: "",
        stderr: "convert failed",
      });
      expect(calls).toHaveLength(1);
    });

    it("stops at a failing gif conversion", async () => {
      const { runner, calls } = createFakeRunner((command) =>
        command.program === "apng2gif" ? 1 : 0,
      );
      const ctx = createStageContext(runner, output);
      const card = makeCard("cards", "enUS", ["A_0001.png"]);

      await expect(processCard(card, cardsVariant, ctx)).rejects.toMatchObject({
        stage: "animated-loop",
        exitCode: 1,
      });
      expect(calls.map((c) => c.program)).not.toContain("ffmpeg");
    });

    it("wraps a runner that throws as a failure of the running stage", async () => {
      const ctx = createStageContext(async () => {
        throw new Error("spawn exploded");
      }, output);

      const error = await processCard(makeCard("cards", "enUS"), cardsVariant, ctx).catch(
        (e: unknown) => e,
      );

      expect(error).toBeInstanceOf(PipelineError);
      expect(error).not.toBeInstanceOf(ToolError);
      expect(error).toMatchObject({ stage: "medium-copy", message: "spawn exploded" });
    });

    it("rejects a bundle without a static image before touching disk", async () => {
      const { runner, calls } = createFakeRunner();
      const ctx = createStageContext(runner, output);
      const card: Card = {
        name: "A",
        locale: "enUS",
        cardClass: "cards",
        bundle: { static: null, animated: [path.join(input, "animated", "A_0001.png")] },
      };

      await expect(processCard(card, cardsVariant, ctx)).rejects.toMatchObject({
        stage: "missing-static",
      });
      expect(calls).toHaveLength(0);
      await expect(stat(output)).rejects.toThrow();
    });

    it("surfaces output folder errors other than an existing folder", async () => {
      // A file where the locale folder should be
      await mkdir(path.join(output, "cards"), { recursive: true });
      await writeFile(path.join(output, "cards", "enUS"), "");
      const { runner, calls } = createFakeRunner();
      const ctx = createStageContext(runner, output);

      await expect(
        processCard(makeCard("cards", "enUS"), cardsVariant, ctx),
      ).rejects.toMatchObject({ stage: "output-folders" });
      expect(calls).toHaveLength(0);
    });
  });
});

describe("getOutputDir", () => {
  it("throws before output paths are resolved", () => {
    const card: Card = {
      name: "A",
      locale: "enUS",
      cardClass: "cards",
      bundle: { static: "/in/A.png", animated: [] },
    };

    expect(() => getOutputDir(card, "medium")).toThrow(
      "Output paths of A are read before processing started",
    );
  });
});
