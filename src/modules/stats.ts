/**
 * Stats Module
 * Displays download statistics and issues
 */

import chalk from "chalk";
import { formatBytes, formatDuration } from "../utils/format";
import type {
  DownloadContext,
  DownloadStats,
  PageIssue,
  ResourceIssue,
} from "../types";
import type { Tracker } from "../utils/tracker";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Progress bar with percentage
 */
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
 * Display download statistics to console
 */
export function stats(ctx: DownloadContext): void {
  const { tracker, verbose, album, target, dryRun } = ctx;
  const stats = tracker.getStats();
  const hasErrors = stats.failedPages > 0;
  const hasWarnings = tracker.getIssues("resource").length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = hasErrors
    ? "Download Failed"
    : dryRun
      ? "Dry Run Complete"
      : "Download Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  if (album) {
    console.log(statRow(chalk.cyan("◉"), "Album", album.title || album.id));
  }
  if (target !== undefined) {
    console.log(statRow(chalk.cyan("◉"), "Directory", target));
  }

  if (!dryRun) {
    displayPagesSection(stats);
  }

  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayPagesSection(stats: DownloadStats): void {
  console.log(sectionHeader("Pages"));

  const done = stats.downloadedPages + stats.skippedPages;
  console.log(`   ${progressBar(done, stats.totalPages)}`);

  console.log(
    statRow(
      chalk.green("◉"),
      "Downloaded",
      stats.downloadedPages,
      chalk.green,
    ),
  );

  if (stats.skippedPages > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Skipped", stats.skippedPages, chalk.yellow),
    );
  }

  if (stats.failedPages > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedPages, chalk.red),
    );
  }

  console.log(
    statRow(chalk.cyan("◉"), "Written", formatBytes(stats.bytesWritten)),
  );
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const pageIssues = tracker
    .getIssues("page")
    .filter((issue): issue is PageIssue => issue.type === "page");
  const resourceIssues = tracker
    .getIssues("resource")
    .filter((issue): issue is ResourceIssue => issue.type === "resource");

  if (pageIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  // The loop stops at the first failure, so this is at most one page
  for (const issue of pageIssues) {
    console.log(
      statRow(chalk.red("✖"), `Page ${issue.page}`, issue.reason, chalk.red),
    );
    console.log(`      ${chalk.dim("·")} ${issue.path}`);
    if (verbose) {
      console.log(`        ${chalk.dim(issue.details)}`);
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Config files",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    for (const issue of resourceIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path} (${issue.reason})`);
      if (verbose) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}
