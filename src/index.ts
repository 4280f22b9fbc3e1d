/**
 * @module dbd-mysql
 * Public API
 */

export * from "./core/index.js";
export * from "./adapters/index.js";
export * from "./config/index.js";
export * from "./client/index.js";
export * from "./legacy/index.js";
