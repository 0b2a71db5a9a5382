/**
 * Stats Module
 * Displays publish statistics and issues
 */

import chalk from "chalk";
import type { Tracker } from "../utils/tracker";
import type { RunStats } from "../types";

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

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(width - filled))} ${chalk.dim(percentText)}`;
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
 * Display run statistics on the console
 */
export function stats(tracker: Tracker, verbose: boolean = false): void {
  const summary = tracker.getStats();
  const hasErrors = tracker.hasFailures();
  const hasWarnings = summary.issues.length > 0 || Object.keys(summary.conditions).length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Publish Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  displaySourcesSection(summary);
  displayConditionsSection(summary);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displaySourcesSection(summary: RunStats): void {
  console.log(sectionHeader("Sources"));
  console.log(`   ${progressBar(summary.publishedSources, summary.totalSources)}`);
  console.log(statRow(chalk.green("◉"), "Published", summary.publishedSources, chalk.green));

  if (summary.haltedSources > 0) {
    console.log(statRow(chalk.red("◉"), "Halted", summary.haltedSources, chalk.red));
  }
  if (summary.failedSources > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", summary.failedSources, chalk.red));
  }
}

function displayConditionsSection(summary: RunStats): void {
  const entries = Object.entries(summary.conditions);
  if (entries.length === 0) return;

  console.log(sectionHeader("Conditions"));
  for (const [label, count] of entries) {
    console.log(statRow(chalk.yellow("◉"), label, count, chalk.yellow));
  }
}

function displayIssuesSection(tracker: Tracker, verbose: boolean): void {
  const halts = tracker.getIssues("halt");
  const configIssues = tracker.getIssues("config");
  const readIssues = tracker.getIssues("read");
  const writeIssues = tracker.getIssues("write");

  if (halts.length + configIssues.length + readIssues.length + writeIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (halts.length > 0) {
    console.log(statRow(chalk.red("✖"), "Halted", halts.length, chalk.red));
    // Halts are listed even without verbose output
    for (const issue of halts) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      console.log(`        ${chalk.dim(`${issue.transform}: ${issue.details}`)}`);
    }
  }

  const groups: Array<[string, Array<{ path: string; details?: string }>]> = [
    ["Configuration", configIssues],
    ["Read failed", readIssues],
    ["Write failed", writeIssues],
  ];

  for (const [label, issues] of groups) {
    if (issues.length === 0) continue;
    console.log(statRow(chalk.yellow("✖"), label, issues.length, chalk.yellow));
    if (verbose) {
      for (const issue of issues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }
}
