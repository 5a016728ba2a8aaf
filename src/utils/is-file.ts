import { stat } from "fs/promises";

/**
 * Check that `path` is an existing regular file
 *
 * A missing path is false; a directory in the way is false too, so the
 * caller's later write reports it. Other stat failures propagate.
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (
      error instanceof Error &&
      "code" in error &&
      (error.code === "ENOENT" || error.code === "ENOTDIR")
    ) {
      return false;
    }
    throw error;
  }
}
