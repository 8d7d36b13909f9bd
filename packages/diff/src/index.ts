/**
 * Binary diff and patch engine.
 *
 * - `buildScript` / `applyOps`: in-memory edit scripts over byte arrays
 * - `generateDiff` / `applyDiff`: chunked, streaming diff files over a `FilesApi`
 * - `validateDiff` / `verifyDiff`: structural and provenance checks
 *
 * @packageDocumentation
 */

export * from "./common/digest.js";
export * from "./common/errors.js";
export * from "./common/logger.js";
export * from "./common/result.js";
export * from "./edit-graph/index.js";
export * from "./format/index.js";
export * from "./integrity/index.js";
export * from "./ops/index.js";
export * from "./script/index.js";
export * from "./streaming/index.js";
