/**
 * Shared building blocks of the entry model.
 */

export * from "./citation.js";
export { loadDataFile } from "./data.js";
export * from "./enums.js";
export * from "./errors.js";
export * from "./evidence.js";
export * from "./primitives.js";
export * from "./validation.js";
