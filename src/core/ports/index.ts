/**
 * @module core/ports
 * Ports (interfaces) toward the native client
 */

export * from "./driver.port.js";
