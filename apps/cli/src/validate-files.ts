import type { FilesApi } from "@mydiff/utils/files";
import { CliError } from "./errors.js";

/**
 * Fail unless `path` exists and is a regular file.
 */
export async function requireFile(files: FilesApi, path: string): Promise<void> {
  const stats = await files.stats(path);
  if (!stats) {
    throw new CliError(`${path} does not exist.`);
  }
  if (stats.kind !== "file") {
    throw new CliError(`${path} is not a file.`);
  }
}

/**
 * Fail unless `path` names a `.diff` file.
 */
export function requireDiffName(path: string): void {
  if (!path.trim().toLowerCase().endsWith(".diff")) {
    throw new CliError(`${path} is not a .diff file.`);
  }
}
