/**
 * Download command - Loads config and runs the download pipeline
 */

import ora from "ora";
import { z } from "zod";
import {
  loadConfig,
  parseRangeSpec,
  Logger,
  Tracker,
  DownloaderError,
} from "../../utils";
import { HttpAlbumService, parseAlbumUrl } from "../../service";
import { ConsoleReporter, SilentReporter } from "../../progress-reporter";
import * as modules from "../../modules";
import type {
  AlbumService,
  DownloadContext,
  DownloaderConfig,
} from "../../types";

const DownloadOptionsSchema = z.object({
  outputDir: z.string().optional(),
  images: z.string().optional(),
  config: z.string().optional(),
  overwrite: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof DownloadOptionsSchema>;

export interface DownloadDependencies {
  createService: (config: DownloaderConfig) => AlbumService;
}

const defaultDependencies: DownloadDependencies = {
  createService: (config) => new HttpAlbumService(config.service, config.http),
};

export async function downloadCommand(
  albumUrl: string,
  opts: Options,
): Promise<void> {
  const code = await runDownload(albumUrl, opts);
  if (code !== 0) {
    process.exit(code);
  }
}

/**
 * Run the whole download and return the process exit code
 */
export async function runDownload(
  albumUrl: string,
  opts: Options,
  deps: DownloadDependencies = defaultDependencies,
): Promise<number> {
  const spinner = ora({ text: "Loading configuration...", indent: 2 });
  let logger = new Logger();
  let ctx: DownloadContext | undefined;

  try {
    // Validate CLI options
    const options = DownloadOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.overwrite) {
      config.output.overwrite = true;
    }

    logger = new Logger(options.verbose ? "debug" : config.logging.level);
    const tracker = new Tracker();

    // Invalid config files are ignored, not fatal
    for (const err of errors) {
      tracker.trackResourceError(err.path, err.error);
      logger.warn(`Ignoring invalid config file ${err.path}`);
    }

    // Argument errors must surface before any request is made
    const albumRef = parseAlbumUrl(albumUrl, config.service.baseUrl);
    const requested =
      options.images === undefined
        ? undefined
        : parseRangeSpec(options.images);

    ctx = {
      config,
      albumRef,
      service: deps.createService(config),
      tracker,
      logger,
      reporter: config.logging.showProgress
        ? new ConsoleReporter()
        : new SilentReporter(),
      requested,
      outputDir: options.outputDir,
      dryRun: options.dryRun,
      verbose: options.verbose,
    };

    spinner.start(`Fetching album ${albumRef.id}...`);
    await modules.resolve(ctx);
    modules.select(ctx);
    spinner.succeed(describeSelection(ctx));

    await modules.download(ctx);

    modules.stats(ctx);
    return 0;
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail("Could not load album");
    }

    // Page failures get the summary so already-saved pages are visible
    if (ctx && ctx.tracker.getIssues("page").length > 0) {
      modules.stats(ctx);
    }

    if (error instanceof DownloaderError) {
      logger.error(error.message);
      logger.debug(String(error.stack));
    } else {
      logger.error("Download failed", error);
    }
    return 1;
  }
}

function describeSelection(ctx: DownloadContext): string {
  const album = ctx.album;
  const pages = ctx.pages ?? [];
  if (!album) return "Album loaded";

  const title = album.title || `Album ${album.id}`;
  const selected =
    pages.length === album.pageCount
      ? "all pages"
      : `${pages.length} selected`;
  return `${title} · ${album.pageCount} pages, ${selected}`;
}
