/**
 * @module codec
 * @description Wire codecs: device command frames, ChirpStack uplink
 * normalization and downlink envelopes.
 */

export * from "./commands.js";
export * from "./uplink.js";
export * from "./downlink.js";
