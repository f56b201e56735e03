/**
 * @module transports
 * @description Downlink transports and the ChirpStack MQTT bridge.
 */

export * from "./mqtt.js";
export * from "./in-memory.js";
