export * from "./apply-ops.js";
export * from "./merge-ops.js";
export * from "./script-builder.js";
