/**
 * Download context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { DownloaderConfig } from "./config";
import type { Album, AlbumReference, AlbumService } from "./album";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { ProgressReporter } from "./progress";
import type { PageRange } from "../utils/parse-range";

// ============================================================================
// Issues
// ============================================================================

export type IssueType = "page" | "resource";

export type PageIssueReason =
  | "timeout"
  | "invalid-response"
  | "network-error"
  | "write-error";

export type ResourceIssueReason =
  | "schema-validation"
  | "invalid-json"
  | "read-error";

export interface PageIssue {
  type: "page";
  page: number;
  path: string;
  reason: PageIssueReason;
  details: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details: string;
}

export type Issue = PageIssue | ResourceIssue;

export interface DownloadStats {
  totalPages: number;
  downloadedPages: number;
  skippedPages: number;
  failedPages: number;
  bytesWritten: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Context
// ============================================================================

export interface DownloadContext {
  // Input - provided at initialization
  config: DownloaderConfig;
  albumRef: AlbumReference;
  service: AlbumService;
  tracker: Tracker;
  logger: Logger;
  reporter: ProgressReporter;

  // Validated --images selection; undefined means every page
  requested?: readonly PageRange[];
  // --output-dir override
  outputDir?: string;
  dryRun?: boolean;
  verbose?: boolean;

  album?: Album; // Written by resolve
  pages?: readonly number[]; // Written by select
  target?: string; // Output directory, written by select
}
