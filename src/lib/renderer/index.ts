/**
 * Renderer module - C++ declarations for the normalized meta-model
 */
export * from "./cpp-syntax.js";
export * from "./property-policy.js";
export * from "./struct-renderer.js";
export * from "./enum-renderer.js";
