/**
 * @module interfaces
 * @description Public interface exports for the safe-zone monitor.
 */

export * from "./event-bus.js";
export * from "./watchlist.js";
export * from "./uplink.js";
export * from "./downlink.js";
export * from "./state-machine.js";
export * from "./dispatcher.js";
export * from "./display.js";
