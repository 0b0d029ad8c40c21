/**
 * Indicator classification, signal fusion and preset strategies.
 * @packageDocumentation
 */

export * from "./classify.js";
export * from "./fusion.js";
export * from "./recommendation.js";
export * from "./strategies/index.js";
