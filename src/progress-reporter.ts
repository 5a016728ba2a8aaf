/**
 * Progress Reporter
 * Prints one line per processed page
 */

import chalk from "chalk";
import { formatPercentage } from "./utils/format";
import type { PageProgress, ProgressReporter } from "./types";

/**
 * Plain progress line, e.g. "[33.3%] album/000001.jpg: 51234 bytes"
 */
export function formatProgressLine(event: PageProgress): string {
  const percentage = formatPercentage(event.position, event.total);
  const prefix = `[${percentage}%] ${event.path}`;
  switch (event.status) {
    case "downloaded":
      return `${prefix}: ${event.bytes} bytes`;
    case "skipped":
      return `${prefix}: skipped`;
    case "planned":
      return `${prefix} <- ${event.url}`;
  }
}

export class ConsoleReporter implements ProgressReporter {
  onPage(event: PageProgress): void {
    const line = formatProgressLine(event);
    console.log(event.status === "skipped" ? chalk.dim(line) : line);
  }
}

export class SilentReporter implements ProgressReporter {
  onPage(): void {}
}
