/**
 * Downloader errors
 * Every failure the CLI reports carries a kind so it can be classified
 */

export type ErrorKind =
  | "invalid-album-url"
  | "invalid-range-spec"
  | "index-out-of-bounds"
  | "remote-service"
  | "download-failure"
  | "filesystem";

export abstract class DownloaderError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidAlbumUrlError extends DownloaderError {
  readonly kind = "invalid-album-url";

  constructor(readonly input: string) {
    super(`No album id found in "${input}"`);
  }
}

export class InvalidRangeSpecError extends DownloaderError {
  readonly kind = "invalid-range-spec";

  constructor(
    readonly token: string,
    reason: string,
  ) {
    super(`Invalid range "${token}": ${reason}`);
  }
}

export class IndexOutOfBoundsError extends DownloaderError {
  readonly kind = "index-out-of-bounds";

  constructor(
    readonly index: number,
    readonly pageCount: number,
  ) {
    super(
      `Asked for page ${index} but the album only has ${pageCount} pages`,
    );
  }
}

export class RemoteServiceError extends DownloaderError {
  readonly kind = "remote-service";

  constructor(
    readonly url: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Album service error for ${url}: ${reason}`, options);
  }
}

export class DownloadFailureError extends DownloaderError {
  readonly kind = "download-failure";

  constructor(
    readonly page: number,
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(
      `Page ${page} failed to download: ${describeCause(options?.cause)}`,
      options,
    );
  }
}

export class FilesystemError extends DownloaderError {
  readonly kind = "filesystem";

  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot write ${path}: ${describeCause(options?.cause)}`, options);
  }
}

/**
 * HTTP status failure raised by the request helper
 * The message format ("HTTP <status>: <text>") is relied on by the tracker
 */
export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    statusText: string,
  ) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = "HttpStatusError";
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return "unknown error";
  return String(cause);
}
