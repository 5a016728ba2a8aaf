/**
 * Resolver Module
 * Fetches album metadata (title, page count, page URLs) from the album service
 */

import type { DownloadContext } from "../types";

/**
 * Writes to context:
 * - album: title, page count and one entry per page
 */
export async function resolve(ctx: DownloadContext): Promise<void> {
  const { albumRef, service, logger } = ctx;

  logger.debug(`Fetching album page ${albumRef.url}`);
  const album = await service.getAlbum(albumRef);
  logger.debug(`Album "${album.title}" has ${album.pageCount} pages`);

  ctx.album = album;
}
