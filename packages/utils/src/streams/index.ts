export * from "./buffered-byte-reader.js";
export * from "./collect.js";
export * from "./to-chunks.js";
