/**
 * Utility exports
 */

// Range and naming utilities
export { parseRangeSpec, expandRange } from "./parse-range";
export type { PageRange } from "./parse-range";
export { pageFilename } from "./page-filename";
export { sanitizeDirectoryName } from "./sanitize-directory-name";
export { fillTemplate } from "./fill-template";
export { formatBytes, formatDuration, formatPercentage } from "./format";

// Filesystem utilities
export { isFile } from "./is-file";

// Network utilities
export { request } from "./request";
export type { Fetcher, RequestOptions } from "./request";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";
export type { ConfigError } from "./load-config";

// Errors
export {
  DownloaderError,
  InvalidAlbumUrlError,
  InvalidRangeSpecError,
  IndexOutOfBoundsError,
  RemoteServiceError,
  DownloadFailureError,
  FilesystemError,
  HttpStatusError,
} from "./errors";
export type { ErrorKind } from "./errors";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
