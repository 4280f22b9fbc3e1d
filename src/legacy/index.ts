export * from "./pear-compat.js";
