export * from "./simulator.js";
export * from "./pipeline.js";
