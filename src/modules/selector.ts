/**
 * Selector Module
 * Picks the pages to download and the directory they go to
 */

import { expandRange } from "../utils/parse-range";
import { sanitizeDirectoryName } from "../utils/sanitize-directory-name";
import type { Album, DownloadContext } from "../types";

/**
 * Default output directory: the album title, or its id when the title is empty
 */
export function defaultOutputDirectory(album: Album): string {
  return sanitizeDirectoryName(album.title) || album.id;
}

/**
 * Writes to context:
 * - pages: ascending, duplicate-free page indices within the album
 * - target: output directory
 *
 * Throws IndexOutOfBoundsError when a requested page is past the album's end.
 */
export function select(ctx: DownloadContext): void {
  if (!ctx.album) {
    throw new Error("Resolver must run before selector");
  }

  const { album, config, tracker } = ctx;

  const pages = expandRange(ctx.requested, album.pageCount);
  const target =
    ctx.outputDir ?? config.output.directory ?? defaultOutputDirectory(album);

  tracker.setTotalPages(pages.length);
  ctx.pages = pages;
  ctx.target = target;
}
