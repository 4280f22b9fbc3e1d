/**
 * @module adapters
 * Adapters for external systems (mysql2 driver, telemetry)
 */

export * from "./mysql/index.js";
export * from "./telemetry/index.js";
