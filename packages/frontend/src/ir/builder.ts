/**
 * IR Builder - main dispatcher
 * Re-exports from builder/ subdirectory
 */

export * from "./builder/index.js";
