export * from "./constants.js";
export * from "./decode.js";
export * from "./encode.js";
