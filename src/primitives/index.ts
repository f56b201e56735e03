/**
 * @module primitives
 * @description Core components of the safe-zone monitor.
 */

export * from "./event-bus.js";
export * from "./watchlist-store.js";
export * from "./command-dispatcher.js";
export * from "./beacon-state-machine.js";
export * from "./watchdog.js";
