/**
 * @module beacon-safe-zone
 * @description Beacon safe-zone alarm monitor: per-beacon debounced
 * proximity decisions over ChirpStack MQTT telemetry, with buzzer
 * commands to a Lansitec macro sensor.
 *
 * Exports the core components (watchlist, state machine, dispatcher,
 * watchdog, event bus), their interfaces, all type definitions, the wire
 * codecs, the MQTT bridge and in-memory transports, configuration, and
 * the BeaconMonitor orchestrator.
 *
 * @version 0.1.0
 * @license MIT
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Codecs ─────────────────────────────────────────────────────────
export * from "./codec/index.js";

// ─── Transport Implementations ──────────────────────────────────────
export * from "./transports/index.js";

// ─── Configuration ──────────────────────────────────────────────────
export { createLogger, componentLogger } from "./config/logger.js";
export type { Logger, LoggerOptions } from "./config/logger.js";
export {
  SettingsSchema,
  defaultSettings,
  parseSettings,
  loadSettings,
  applyEnvironment,
  withBrokerHost,
  DEFAULT_SETTINGS_PATH,
} from "./config/settings.js";
export type { Settings, SettingsInput } from "./config/settings.js";

// ─── Display ────────────────────────────────────────────────────────
export { LogStatusDisplay, formatStatusLine } from "./display.js";

// ─── Orchestrator ───────────────────────────────────────────────────
export { BeaconMonitor } from "./monitor.js";
export type { BeaconMonitorOptions } from "./monitor.js";

// ─── Forwarder (optional: wires monitor events → display + hooks) ───
export { wire, loggingHooks } from "./forwarder.js";
export type {
  AlarmHooks,
  ForwarderConfig,
  ForwarderHandle,
  SnapshotSource,
} from "./forwarder.js";
