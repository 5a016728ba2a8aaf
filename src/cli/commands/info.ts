/**
 * Info command - Show album metadata without downloading
 */

import chalk from "chalk";
import { z } from "zod";
import { loadConfig, Logger, DownloaderError } from "../../utils";
import { HttpAlbumService, parseAlbumUrl } from "../../service";
import { defaultOutputDirectory } from "../../modules/selector";

const InfoOptionsSchema = z.object({
  config: z.string().optional(),
});

type Options = z.infer<typeof InfoOptionsSchema>;

export async function infoCommand(
  albumUrl: string,
  opts: Options,
): Promise<void> {
  const logger = new Logger();

  try {
    const options = InfoOptionsSchema.parse(opts);
    const { config, errors } = await loadConfig(options.config);
    for (const err of errors) {
      logger.warn(`Ignoring invalid config file ${err.path}`);
    }

    const ref = parseAlbumUrl(albumUrl, config.service.baseUrl);
    const service = new HttpAlbumService(config.service, config.http);
    const album = await service.getAlbum(ref);

    console.log(`${chalk.dim("Album:".padEnd(12))} ${album.id}`);
    console.log(`${chalk.dim("Title:".padEnd(12))} ${album.title}`);
    console.log(`${chalk.dim("URL:".padEnd(12))} ${album.url}`);
    console.log(`${chalk.dim("Pages:".padEnd(12))} ${album.pageCount}`);
    console.log(
      `${chalk.dim("Directory:".padEnd(12))} ${defaultOutputDirectory(album)}`,
    );
  } catch (error) {
    if (error instanceof DownloaderError) {
      logger.error(error.message);
    } else {
      logger.error("Could not load album", error);
    }
    process.exit(1);
  }
}
