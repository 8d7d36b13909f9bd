export * from "./provenance.js";
export * from "./validate-diff.js";
