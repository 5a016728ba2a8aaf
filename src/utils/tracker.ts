/**
 * Download Tracker
 * Unified tracking for page outcomes and issues
 */

import { ZodError } from "zod";
import { DownloaderError } from "./errors";
import type {
  Issue,
  IssueType,
  PageIssueReason,
  ResourceIssueReason,
  DownloadStats,
} from "../types";

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
    return { reason: "invalid-json", details: error.message };
  }
  if (error instanceof Error) {
    return { reason: "read-error", details: error.message };
  }
  return { reason: "read-error", details: String(error) };
}

function mapPageError(error: unknown): IssueInfo<PageIssueReason> {
  if (error instanceof DownloaderError && error.kind === "filesystem") {
    return { reason: "write-error", details: error.message };
  }

  // Classify by the underlying failure, keep the page-level message
  const details = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error.cause : undefined;

  if (cause instanceof Error) {
    if (cause.name === "AbortError") {
      return { reason: "timeout", details };
    }
    if (cause.message.startsWith("HTTP ")) {
      return { reason: "invalid-response", details };
    }
  }
  return { reason: "network-error", details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalPages = 0;
  private downloadedPages = 0;
  private skippedPages = 0;
  private failedPages = 0;
  private bytesWritten = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalPages(count: number): void {
    this.totalPages = count;
  }

  trackDownloaded(bytes: number): void {
    this.downloadedPages++;
    this.bytesWritten += bytes;
  }

  incrementSkipped(): void {
    this.skippedPages++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackPageError(page: number, path: string, error: unknown): void {
    this.failedPages++;
    const { reason, details } = mapPageError(error);
    this.issues.push({ type: "page", page, path, reason, details });
  }

  trackResourceError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): DownloadStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      totalPages: this.totalPages,
      downloadedPages: this.downloadedPages,
      skippedPages: this.skippedPages,
      failedPages: this.failedPages,
      bytesWritten: this.bytesWritten,
      issues: this.issues,
      duration,
    };
  }
}
