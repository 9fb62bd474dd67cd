/**
 * IR module exports
 */

export * from "./types.js";
export * from "./builder.js";
export * from "./validation/index.js";
