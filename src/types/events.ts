/**
 * @module types/events
 * @description Event catalog for the monitor's in-process event bus.
 *
 * The state machine, watchdog, dispatcher and watchlist store publish these
 * events; displays, hooks and logging subscribe. Every event carries a
 * `type` discriminator and the time it was produced.
 */

import type { BeaconId, DeviceEui, EpochSeconds } from "./branded.js";
import type { UnsafeReason, Zone } from "./beacon.js";
import type { AlarmCause, CommandKind } from "./command.js";

// ─── Beacon Events ──────────────────────────────────────────────────

/** Emitted when a beacon's first observation is processed (startup rule). */
export interface BeaconInitializedEvent {
  readonly type: "BEACON_INITIALIZED";
  readonly beaconId: BeaconId;
  readonly displayName: string;
  readonly rssi: number;
  readonly timestamp: EpochSeconds;
}

/** Emitted whenever a beacon's zone changes after initialization. */
export interface BeaconStateChangedEvent {
  readonly type: "BEACON_STATE_CHANGED";
  readonly beaconId: BeaconId;
  readonly previousZone: Zone;
  readonly currentZone: Zone;
  readonly rssi: number | null;
  readonly reason: UnsafeReason | null;
  readonly timestamp: EpochSeconds;
}

/** Emitted when the watchdog declares a beacon silent. */
export interface BeaconLostEvent {
  readonly type: "BEACON_LOST";
  readonly beaconId: BeaconId;
  readonly silentForSeconds: number;
  readonly timestamp: EpochSeconds;
}

/** Emitted when auto-discovery adds an unknown beacon to the watchlist. */
export interface BeaconDiscoveredEvent {
  readonly type: "BEACON_DISCOVERED";
  readonly beaconId: BeaconId;
  readonly displayName: string;
  readonly timestamp: EpochSeconds;
}

// ─── Alarm Events ───────────────────────────────────────────────────

/** Emitted on every rising edge of a beacon's alarm latch. */
export interface AlarmTriggeredEvent {
  readonly type: "ALARM_TRIGGERED";
  readonly beaconId: BeaconId;
  readonly targetDevice: DeviceEui;
  readonly cause: AlarmCause;
  readonly timestamp: EpochSeconds;
}

/** Emitted when a latched alarm is cleared and a stop command queued. */
export interface AlarmSilencedEvent {
  readonly type: "ALARM_SILENCED";
  readonly beaconId: BeaconId | null;
  readonly targetDevice: DeviceEui;
  readonly timestamp: EpochSeconds;
}

// ─── Downlink Events ────────────────────────────────────────────────

/** Emitted after the transport accepted a downlink. */
export interface DownlinkSentEvent {
  readonly type: "DOWNLINK_SENT";
  readonly targetDevice: DeviceEui;
  readonly command: CommandKind;
  readonly payloadHex: string;
  readonly port: number;
  readonly timestamp: EpochSeconds;
}

/** Emitted when building or sending a downlink failed. */
export interface DownlinkFailedEvent {
  readonly type: "DOWNLINK_FAILED";
  readonly targetDevice: DeviceEui;
  readonly command: CommandKind;
  readonly error: string;
  readonly timestamp: EpochSeconds;
}

// ─── Watchlist Events ───────────────────────────────────────────────

/** Emitted after the watchlist table was replaced. */
export interface WatchlistReloadedEvent {
  readonly type: "WATCHLIST_RELOADED";
  readonly beaconCount: number;
  readonly zoneCount: number;
  readonly timestamp: EpochSeconds;
}

// ─── Union Types ────────────────────────────────────────────────────

export type BeaconEvent =
  | BeaconInitializedEvent
  | BeaconStateChangedEvent
  | BeaconLostEvent
  | BeaconDiscoveredEvent;

export type AlarmEvent = AlarmTriggeredEvent | AlarmSilencedEvent;

export type DownlinkEvent = DownlinkSentEvent | DownlinkFailedEvent;

/** Union of all monitor events. */
export type MonitorEvent =
  | BeaconEvent
  | AlarmEvent
  | DownlinkEvent
  | WatchlistReloadedEvent;

/**
 * Extract the event type string literal from a MonitorEvent.
 */
export type MonitorEventType = MonitorEvent["type"];

/**
 * Map from event type string to the corresponding event interface.
 */
export type MonitorEventMap = {
  [K in MonitorEventType]: Extract<MonitorEvent, { type: K }>;
};
