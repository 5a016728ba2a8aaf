import type { OutputConfig } from "../types";

/**
 * Build the file name of a page: zero-padded index plus extension
 * The width covers both the configured padding and the album's largest index.
 */
export function pageFilename(
  index: number,
  pageCount: number,
  output: Pick<OutputConfig, "padding" | "extension">,
): string {
  const width = Math.max(output.padding, String(pageCount).length);
  return `${String(index).padStart(width, "0")}.${output.extension}`;
}
