/**
 * Node.js bindings for mydiff: a filesystem-backed `FilesApi` and a
 * streaming SHA-256 digest.
 *
 * @example
 * ```ts
 * import { createNodeFilesApi, sha256 } from "@mydiff/utils-node";
 *
 * const files = createNodeFilesApi({ rootDir: process.cwd() });
 * const digest = await sha256(files.read("old.bin"));
 * ```
 *
 * @packageDocumentation
 */

export * from "./files/index.js";
export * from "./hash/index.js";
