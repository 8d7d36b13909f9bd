export * from "./diff-op.js";
