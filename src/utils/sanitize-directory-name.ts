/**
 * Make an album title usable as a single directory name
 */
export function sanitizeDirectoryName(title: string): string {
  return title.replace(/\s+/g, " ").replace(/[/\\\0]/g, "_").trim();
}
