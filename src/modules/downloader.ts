/**
 * Downloader Module
 * Fetches pages one at a time and writes each before the next is requested
 */

import { mkdir, rename, rm, writeFile } from "fs/promises";
import { join } from "node:path";
import { isFile } from "../utils/is-file";
import { pageFilename } from "../utils/page-filename";
import { FilesystemError } from "../utils/errors";
import type { AlbumPage, DownloadContext } from "../types";

/**
 * Write the page to `<path>.part` first so an interrupted run never leaves
 * a truncated file under the final name
 */
async function savePage(path: string, bytes: Uint8Array): Promise<void> {
  const partPath = `${path}.part`;
  try {
    await writeFile(partPath, bytes);
    await rename(partPath, path);
  } catch (error) {
    await rm(partPath, { force: true });
    throw new FilesystemError(path, { cause: error });
  }
}

/**
 * Downloads the selected pages, stopping at the first failure
 *
 * Existing files are skipped unless `output.overwrite` is set. In dry-run
 * mode nothing is fetched or written; each page is only reported.
 */
export async function download(ctx: DownloadContext): Promise<void> {
  if (!ctx.album || !ctx.pages || ctx.target === undefined) {
    throw new Error("Selector must run before downloader");
  }

  const { album, pages, target, config, service, tracker, reporter, logger } =
    ctx;
  const total = pages.length;
  let processed = 0;

  if (!ctx.dryRun) {
    try {
      await mkdir(target, { recursive: true });
    } catch (error) {
      throw new FilesystemError(target, { cause: error });
    }
  }

  for (const index of pages) {
    const page: AlbumPage = album.pages[index - 1];
    const filename = pageFilename(index, album.pageCount, config.output);
    const path = join(target, filename);
    const event = { page: index, total, path, url: page.url };

    if (ctx.dryRun) {
      processed++;
      reporter.onPage({
        ...event,
        position: processed,
        bytes: 0,
        status: "planned",
      });
      continue;
    }

    if (!config.output.overwrite && (await isFile(path))) {
      processed++;
      tracker.incrementSkipped();
      reporter.onPage({
        ...event,
        position: processed,
        bytes: 0,
        status: "skipped",
      });
      continue;
    }

    logger.debug(`GET ${page.url}`);
    try {
      const bytes = await service.fetchPage(page);
      await savePage(path, bytes);
      processed++;
      tracker.trackDownloaded(bytes.byteLength);
      reporter.onPage({
        ...event,
        position: processed,
        bytes: bytes.byteLength,
        status: "downloaded",
      });
    } catch (error) {
      tracker.trackPageError(index, path, error);
      throw error;
    }
  }
}
