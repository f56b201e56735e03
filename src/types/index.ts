/**
 * @module types
 * @description Public type exports for the safe-zone monitor.
 */

export * from "./branded.js";
export * from "./beacon.js";
export * from "./topology.js";
export * from "./command.js";
export * from "./events.js";
