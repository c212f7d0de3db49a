/**
 * Stats Module
 * Displays conversion statistics and issues
 */

import chalk from "chalk";
import type { ConversionContext, ProcessingStats, Tracker } from "../types";

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

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
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

export function stats(ctx: ConversionContext): void {
  const { tracker, verbose } = ctx;
  const stats = tracker.getStats();
  const hasWarnings =
    stats.discardedEdges > 0 ||
    stats.danglingEdges > 0 ||
    stats.repairedFiles > 0;
  const hasErrors = stats.failedFiles > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Conversion Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayFilesSection(stats);
  displayGraphSection(stats);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Files"));
  console.log(`   ${progressBar(stats.successfulFiles, stats.totalFiles)}`);

  console.log(
    statRow(chalk.green("◉"), "Converted", stats.successfulFiles, chalk.green),
  );

  if (stats.failedFiles > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedFiles, chalk.red),
    );
  }

  if (stats.repairedFiles > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Repaired", stats.repairedFiles, chalk.yellow),
    );
  }
}

function displayGraphSection(stats: ProcessingStats): void {
  if (stats.nodes === 0 && stats.edges === 0) {
    return;
  }

  console.log(sectionHeader("Graph"));
  console.log(statRow(chalk.cyan("◉"), "Nodes", stats.nodes, chalk.cyan));
  console.log(statRow(chalk.cyan("◉"), "Edges", stats.edges, chalk.cyan));

  if (stats.discardedEdges > 0) {
    console.log(
      statRow(
        chalk.yellow("◉"),
        "Discarded edges",
        stats.discardedEdges,
        chalk.yellow,
      ),
    );
  }

  if (stats.danglingEdges > 0) {
    console.log(
      statRow(
        chalk.yellow("◉"),
        "Dangling edges",
        stats.danglingEdges,
        chalk.yellow,
      ),
    );
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const fileIssues = tracker.getIssues("file");
  const resourceIssues = tracker.getIssues("resource");
  const repairIssues = tracker.getIssues("repair");
  const edgeIssues = tracker.getIssues("edge");

  if (verbose && repairIssues.length > 0) {
    console.log(sectionHeader(chalk.yellow("Repairs")));
    for (const issue of repairIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.stage})`)}`);
    }
  }

  if (verbose && edgeIssues.length > 0) {
    console.log(sectionHeader(chalk.yellow("Skipped edges")));
    for (const issue of edgeIssues.slice(0, 10)) {
      console.log(`      ${chalk.dim("·")} ${issue.text} ${chalk.dim(`(${issue.reason})`)}`);
    }
    if (edgeIssues.length > 10) {
      console.log(`      ${chalk.dim(`  +${edgeIssues.length - 10} more`)}`);
    }
  }

  if (fileIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (fileIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Files failed", fileIssues.length, chalk.red),
    );
    for (const issue of fileIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
      if (verbose && issue.details) {
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
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }
}
