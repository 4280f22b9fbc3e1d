/**
 * @module core/domain
 * Value objects, errors and services shared by connections and cursors
 */

export * from "./value-objects/index.js";
export * from "./services/index.js";
export * from "./errors/index.js";
