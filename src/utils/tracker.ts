/**
 * Conversion Tracker
 * Unified tracking for card outcomes and issues
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import { ToolError } from "../pipeline/errors";
import { cardLabel } from "./card-label";
import type { CardClass, PipelineResult, PipelineStage } from "../types";

// ============================================================================
// Types
// ============================================================================

export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type carries its own details
export interface CardIssue {
  type: "card";
  path: string; // Card label (name:locale)
  cardClass: CardClass;
  stage: PipelineStage;
  details: string;
  command?: string;
  exitCode?: number;
  stderr?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = CardIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  totalCards: number;
  successfulCards: number;
  failedCards: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalCards = 0;
  private successfulCards = 0;
  private failedCards = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalCards(count: number): void {
    this.totalCards = count;
  }

  /**
   * Count one card outcome, recording an issue for failures
   */
  trackResult(result: PipelineResult): void {
    if (result.status === "success") {
      this.successfulCards++;
      return;
    }

    this.failedCards++;
    const { card, error } = result;
    const issue: CardIssue = {
      type: "card",
      path: cardLabel(card),
      cardClass: card.cardClass,
      stage: error.stage,
      details: error.message,
    };
    if (error instanceof ToolError) {
      issue.command = error.command;
      issue.exitCode = error.exitCode;
      issue.stderr = error.stderr;
    }
    this.issues.push(issue);
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track a configuration file that failed to load
   */
  trackResourceError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getCardIssues(): CardIssue[] {
    return this.issues.filter((i): i is CardIssue => i.type === "card");
  }

  getResourceIssues(): ResourceIssue[] {
    return this.issues.filter((i): i is ResourceIssue => i.type === "resource");
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      totalCards: this.totalCards,
      successfulCards: this.successfulCards,
      failedCards: this.failedCards,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputDir: string): Promise<void> {
    const stats = this.getStats();

    const exported = {
      summary: {
        totalCards: stats.totalCards,
        successfulCards: stats.successfulCards,
        failedCards: stats.failedCards,
        duration: stats.duration,
      },
      issues: this.groupIssuesByType(),
    };

    await mkdir(outputDir, { recursive: true });
    const outputPath = join(outputDir, "stats.json");
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupIssuesByType(): {
    card: Record<string, CardIssue[]>;
    resource: ResourceIssue[];
  } {
    const grouped: {
      card: Record<string, CardIssue[]>;
      resource: ResourceIssue[];
    } = {
      card: {},
      resource: this.getResourceIssues(),
    };

    // Card issues grouped by failed stage
    for (const issue of this.getCardIssues()) {
      if (!grouped.card[issue.stage]) {
        grouped.card[issue.stage] = [];
      }
      grouped.card[issue.stage].push(issue);
    }

    return grouped;
  }
}
