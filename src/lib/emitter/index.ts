/**
 * Emitter module - assembles generated headers and writes them to disk
 */
export * from "./types.js";
export * from "./assembler.js";
export * from "./artifact-writer.js";
