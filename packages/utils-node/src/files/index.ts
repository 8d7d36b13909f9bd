/**
 * Node.js filesystem-backed FilesApi implementation
 *
 * Provides a FilesApi backed by the Node.js filesystem.
 * Uses a factory function to hide implementation details and provide
 * a clean API.
 */

import * as fs from "node:fs/promises";
import { parse, resolve } from "node:path";
import { FilesApiAdapter, type FilesApi } from "@mydiff/utils/files";
import { NodeFilesApi, FilesApi as WebrunFilesApi } from "@statewalker/webrun-files";

export interface NodeFilesApiOptions {
  /** Directory relative paths resolve against; absolute paths are used as given */
  rootDir: string;
}

/**
 * Create a Node.js filesystem-backed FilesApi instance.
 *
 * @example
 * ```typescript
 * import { createNodeFilesApi } from "@mydiff/utils-node/files";
 *
 * const files = createNodeFilesApi({ rootDir: process.cwd() });
 * ```
 */
export function createNodeFilesApi(options: NodeFilesApiOptions): FilesApi {
  const rootDir = resolve(options.rootDir);
  // Rooted at the volume root: callers may pass absolute paths.
  const nodeApi = new NodeFilesApi({ fs, rootDir: parse(rootDir).root });
  return new FilesApiAdapter(new WebrunFilesApi(nodeApi), {
    resolvePath: (path) => resolve(rootDir, path),
  });
}
