export * from "./result-cursor.js";
export * from "./statement-cursor.js";
