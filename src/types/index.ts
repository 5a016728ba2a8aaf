/**
 * Central type exports
 */

// Configuration
export type {
  DownloaderConfig,
  PartialDownloaderConfig,
  ServiceConfig,
  HttpConfig,
  OutputConfig,
  LoggingConfig,
  LogLevel,
  ImageUrlPlaceholder,
} from "./config";
export {
  IMAGE_URL_PLACEHOLDERS,
  ServiceConfigSchema,
  DownloaderConfigSchema,
  PartialDownloaderConfigSchema,
} from "./config";

// Album
export type {
  Album,
  AlbumPage,
  AlbumReference,
  AlbumService,
} from "./album";

// Progress
export type { PageProgress, PageStatus, ProgressReporter } from "./progress";

// Context
export type {
  DownloadContext,
  DownloadStats,
  Issue,
  IssueType,
  PageIssue,
  PageIssueReason,
  ResourceIssue,
  ResourceIssueReason,
} from "./context";
