/**
 * @module types/topology
 * @description Watchlist and physical topology: which beacons are tracked,
 * where each one belongs, and which gateway reports from which zone.
 */

import type { BeaconId, DeviceEui, ZoneId } from "./branded.js";

/**
 * A tracked beacon.
 */
export interface WatchlistEntry {
  readonly beaconId: BeaconId;
  readonly displayName: string;
  /** Assigned home zone; only consulted when topology awareness is on. */
  readonly homeZoneId: ZoneId | null;
}

/**
 * A physical zone and the devices installed in it.
 */
export interface ZoneDefinition {
  readonly id: ZoneId;
  readonly name: string;
  /** Macro sensor that buzzes for beacons detected in this zone. */
  readonly alarmDevice: DeviceEui | null;
  /** Gateways/sensors whose reports place a beacon in this zone. */
  readonly gateways: readonly DeviceEui[];
}

/**
 * Immutable lookup table. The store swaps whole tables on reload.
 */
export interface WatchlistTable {
  readonly beacons: ReadonlyMap<BeaconId, WatchlistEntry>;
  readonly zones: ReadonlyMap<ZoneId, ZoneDefinition>;
  readonly gatewayZones: ReadonlyMap<DeviceEui, ZoneId>;
}

/**
 * Outcome of resolving a raw beacon id against the watchlist.
 */
export type WatchlistResolution =
  | {
      readonly tracked: true;
      readonly beaconId: BeaconId;
      readonly displayName: string;
      /** True when auto-discovery inserted the entry during this call. */
      readonly discovered: boolean;
    }
  | {
      readonly tracked: false;
      readonly beaconId: BeaconId;
    };
