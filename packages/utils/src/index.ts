export * from "./files/index.js";
export * from "./hex/index.js";
export * from "./streams/index.js";
