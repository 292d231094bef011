/**
 * Convert command - Loads config and runs the conversion
 */

import ora from "ora";
import { z } from "zod";
import { createContext } from "../../converter";
import * as modules from "../../modules";
import { CardClassSchema } from "../../types";
import { Logger, Tracker, loadConfig } from "../../utils";

const ConvertOptionsSchema = z.object({
  types: z.array(CardClassSchema).nonempty().optional(),
  processes: z.coerce.number().int().positive().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof ConvertOptionsSchema>;

export async function convertCommand(
  input: string,
  output: string,
  opts: Options,
): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);

    // Load configuration (default → user → $CARDCONVERT_CONFIG → custom)
    const { config, errors } = await loadConfig({ custom: options.config });

    const logger = new Logger(
      options.verbose ? "debug" : config.logging.level,
    );
    const tracker = new Tracker();

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackResourceError(err.path, err.error);
    }

    const ctx = createContext(
      config,
      {
        cardTypes: options.types ?? [...CardClassSchema.options],
        input,
        output,
        workers: options.processes,
      },
      {
        logger,
        tracker,
        verbose: options.verbose,
        onProgress: (done, total) => {
          spinner.text = `Processing cards (${done}/${total})...`;
        },
      },
    );

    spinner.text = "Scanning files...";
    await modules.scan(ctx);

    spinner.text = "Processing cards...";
    await modules.process(ctx);

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    await modules.stats(ctx);

    if (tracker.getStats().failedCards > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail("Conversion failed");
    console.error(error);
    process.exit(1);
  }
}
