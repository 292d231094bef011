/**
 * Stats Module
 * Displays run statistics and failed cards
 */

import chalk from "chalk";
import type {
  CardIssue,
  ConversionContext,
  ProcessingStats,
  ResourceIssue,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export stats to JSON and display run statistics to console
 */
export async function stats(ctx: ConversionContext): Promise<void> {
  const { output, tracker, verbose } = ctx;
  await tracker.exportStats(output);

  const stats = tracker.getStats();
  const hasErrors = stats.failedCards > 0;
  const hasWarnings = tracker.getResourceIssues().length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Conversion Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayCardsSection(stats);
  displayIssuesSection(
    tracker.getCardIssues(),
    tracker.getResourceIssues(),
    verbose,
  );

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayCardsSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Cards"));

  const bar = progressBar(stats.successfulCards, stats.totalCards);
  console.log(`   ${bar}`);

  console.log(
    statRow(chalk.green("◉"), "Processed", stats.successfulCards, chalk.green),
  );

  if (stats.failedCards > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedCards, chalk.red),
    );
  }
}

function displayIssuesSection(
  cardIssues: CardIssue[],
  resourceIssues: ResourceIssue[],
  verbose?: boolean,
): void {
  if (cardIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (cardIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Cards failed", cardIssues.length, chalk.red),
    );
    for (const issue of cardIssues) {
      console.log(
        `      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.cardClass}, ${issue.stage})`)}`,
      );
      if (!verbose) continue;
      if (issue.command) {
        console.log(`        ${chalk.dim(issue.command)}`);
      }
      if (issue.exitCode !== undefined) {
        console.log(`        ${chalk.dim(`Return Code: ${issue.exitCode}`)}`);
      }
      if (issue.stderr) {
        console.log(`        ${chalk.dim(issue.stderr.trim())}`);
      } else {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Config failed",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    for (const issue of resourceIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}
