export * from "./apply-diff.js";
export * from "./generate-diff.js";
