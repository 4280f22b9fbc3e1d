/**
 * @module adapters/mysql
 * mysql2 implementation of the driver port
 */

export * from "./buffered-result.js";
export * from "./mysql2-driver.js";
