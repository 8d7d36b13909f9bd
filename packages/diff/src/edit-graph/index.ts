export * from "./box.js";
export * from "./midpoint-search.js";
