export * from "./fetch-mode.js";
export * from "./param-type.js";
export * from "./placeholders.js";
export * from "./exclusive-lock.js";
