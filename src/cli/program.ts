/**
 * Command-line program definition
 * Handlers are injectable so the parsing can be checked without side effects
 */

import { Command } from "commander";
import { downloadCommand } from "./commands/download";
import { infoCommand } from "./commands/info";
import { configCommand } from "./commands/config";

export interface ProgramHandlers {
  download: typeof downloadCommand;
  info: typeof infoCommand;
  config: typeof configCommand;
}

const defaultHandlers: ProgramHandlers = {
  download: downloadCommand,
  info: infoCommand,
  config: configCommand,
};

export function createProgram(
  handlers: ProgramHandlers = defaultHandlers,
): Command {
  const program = new Command();

  program
    .name("inha-dl")
    .description("Download page images from INHA digital library albums")
    .version("0.1.0")
    // Root options stop at the subcommand name, so `info -c` reaches info
    .enablePositionalOptions();

  // Main download command (default action)
  program
    .argument(
      "<album_url>",
      "Album URL, e.g. https://bibliotheque-numerique.inha.fr/viewer/12345",
    )
    .option(
      "-o, --output-dir <dir>",
      "Directory to store images in, created if missing (default: album title)",
    )
    .option(
      "-i, --images <range>",
      "Pages to download, e.g. '1-3,5,7,10-15' (default: all pages)",
    )
    .option("-c, --config <path>", "Path to custom config file")
    .option("--overwrite", "Download pages even if the file already exists")
    .option("--dry-run", "List pages and URLs without downloading")
    .option("-v, --verbose", "Verbose output")
    .action(handlers.download);

  // Info command - album metadata only
  program
    .command("info <album_url>")
    .description("Show album title and page count without downloading")
    .option("-c, --config <path>", "Path to custom config file")
    .action(handlers.info);

  // Config command - show config location
  program
    .command("config")
    .description("Show configuration file location and settings")
    .action(handlers.config);

  return program;
}
