export * from "./defaults.js";
export * from "./loader.js";
