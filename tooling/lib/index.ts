/**
 * Central export point for all tooling modules
 */

export * from "./types";
export * from "./config";
export * from "./registry";
export * from "./utils";
export * from "./serialization";
export * from "./snapshot-source";
export * from "./runner";
export * from "./logger";
