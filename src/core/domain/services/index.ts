export * from "./query-logger.js";
export * from "./readonly-guard.js";
export * from "./trace-comment.js";
