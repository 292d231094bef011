#!/usr/bin/env node

/**
 * CLI entry point for CardConvert
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("cardconvert")
  .description(
    "Convert card artwork into resized copies, icons, animated GIFs and web video",
  )
  .version("0.1.0");

// Main conversion command (default action)
program
  .argument("<input>", "Input directory containing the card class folders")
  .argument("<output>", "Output directory for converted assets")
  .option(
    "-t, --types <types...>",
    "Card types to convert (cards, heroes, cardbacks)",
  )
  .option("-p, --processes <count>", "Number of cards converted in parallel")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

// Config command - show config and backgrounds locations
program
  .command("config")
  .description("Show configuration file and backgrounds folder locations")
  .action(configCommand);

program.parse();
