/**
 * IR Builder - public API
 */

export { buildUnitFromSource, type UnitBuildResult } from "./orchestrator.js";
export * from "./factory.js";
