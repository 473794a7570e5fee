/**
 * lsp-specgen: generate C++ protocol declarations and JSON bindings from a
 * protocol meta-model
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/meta-model.js";
export * from "./types/config.js";

// Modules
export * from "./lib/loader/index.js";
export * from "./lib/normalizer/index.js";
export * from "./lib/resolver/index.js";
export * from "./lib/renderer/index.js";
export * from "./lib/binding/index.js";
export * from "./lib/messages/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/reporter/index.js";
export * from "./lib/generator/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
export { pkg } from "./version.js";
