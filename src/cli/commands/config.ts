/**
 * Config command - Show where settings come from and their current values
 */

import chalk from "chalk";
import { getUserConfigPath, isFile, loadConfig } from "../../utils";
import type { DownloaderConfig } from "../../types";

/**
 * One "section.key  value" line per effective setting
 */
export function describeConfig(config: DownloaderConfig): string[] {
  const lines: string[] = [];
  for (const [section, values] of Object.entries(config)) {
    for (const [key, value] of Object.entries(values)) {
      const name = `${section}.${key}`.padEnd(26);
      lines.push(`${name} ${JSON.stringify(value)}`);
    }
  }
  return lines;
}

export async function configCommand(): Promise<void> {
  const configPath = getUserConfigPath();
  const present = await isFile(configPath);
  const { config, errors } = await loadConfig();

  console.log("User configuration file location:");
  console.log(
    `${configPath} ${chalk.dim(present ? "(found)" : "(not created yet)")}`,
  );
  for (const err of errors) {
    console.log(chalk.yellow(`Ignored, invalid: ${err.path}`));
  }

  console.log("\nEffective settings:");
  for (const line of describeConfig(config)) {
    console.log(`  ${line}`);
  }

  console.log(
    "\nThe file may override any of these: service (album site and image URL",
  );
  console.log(
    "template), http (timeout, user agent), output (directory, extension,",
  );
  console.log("padding, overwrite) and logging (level, progress lines).");
}
