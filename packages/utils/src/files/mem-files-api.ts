/**
 * In-memory FilesApi implementation
 *
 * Provides an in-memory filesystem for tests and temporary storage.
 */

import { MemFilesApi, FilesApi as WebrunFilesApi } from "@statewalker/webrun-files";
import { FilesApiAdapter } from "./files-api-adapter.js";
import type { FilesApi } from "./files-api.js";

async function populate(
  files: WebrunFilesApi,
  initialFiles: Record<string, string | Uint8Array>,
): Promise<void> {
  for (const [path, content] of Object.entries(initialFiles)) {
    const data = typeof content === "string" ? new TextEncoder().encode(content) : content;
    await files.write(toStorePath(path), [data]);
  }
}

function toStorePath(path: string): string {
  return path.startsWith("/") ? path : `/${path}`;
}

/**
 * Create an in-memory FilesApi instance.
 *
 * @param initialFiles - Optional initial file contents
 *
 * @example
 * ```typescript
 * const files = createInMemoryFilesApi({
 *   "old.bin": "abcabba",
 *   "data/new.bin": new Uint8Array([1, 2, 3]),
 * });
 * ```
 */
export function createInMemoryFilesApi(
  initialFiles?: Record<string, string | Uint8Array>,
): FilesApi {
  const wrapped = new WebrunFilesApi(new MemFilesApi());
  return new FilesApiAdapter(wrapped, {
    resolvePath: toStorePath,
    ready: initialFiles ? populate(wrapped, initialFiles) : undefined,
  });
}
