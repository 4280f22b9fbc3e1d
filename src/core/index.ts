/**
 * @module core
 * Core layer exports (domain + ports + cursors)
 */

export * from "./domain/index.js";
export * from "./ports/index.js";
export * from "./cursor/index.js";
