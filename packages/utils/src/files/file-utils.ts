import type { FilesApi } from "./files-api.js";

/**
 * Write `content` next to `path` and move it into place once complete.
 *
 * Readers never observe a partially written file. When producing the content
 * fails, the temporary file is removed and the error is rethrown.
 *
 * @returns The temporary path that was used
 */
export async function writeAtomically(
  files: FilesApi,
  path: string,
  content: Iterable<Uint8Array> | AsyncIterable<Uint8Array>,
): Promise<string> {
  const tempPath = `${path}.${Date.now().toString(36)}${Math.random().toString(36).slice(2, 8)}.tmp`;
  try {
    await files.write(tempPath, content);
    await files.move(tempPath, path);
  } catch (error) {
    await files.remove(tempPath);
    throw error;
  }
  return tempPath;
}
