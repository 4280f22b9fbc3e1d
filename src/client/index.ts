export * from "./connection.js";
export * from "./statement.js";
