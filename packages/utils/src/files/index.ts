export * from "./file-utils.js";
export * from "./files-api.js";
export * from "./files-api-adapter.js";
export * from "./mem-files-api.js";
