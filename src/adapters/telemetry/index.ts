export * from "./tracer.js";
