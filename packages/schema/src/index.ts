export * from "./enums.js";
export * from "./part-key.js";
export * from "./manifest.js";
