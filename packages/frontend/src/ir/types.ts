/**
 * Intermediate Representation (IR) types for the lifthook analysis core
 */

export * from "./types/index.js";
