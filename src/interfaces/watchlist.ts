/**
 * @module interfaces/watchlist
 * @description IWatchlistStore: tracked beacons and physical topology.
 *
 * Read-only from the state machine's point of view. A reload replaces the
 * whole table in one step, so a lookup sees either the old table or the
 * new one, never a mixture.
 */

import type { BeaconId, DeviceEui, ZoneId } from "../types/branded.js";
import type {
  WatchlistEntry,
  WatchlistResolution,
  WatchlistTable,
} from "../types/topology.js";

/**
 * Errors that may be thrown while loading a watchlist.
 */
export class WatchlistError extends Error {
  constructor(
    message: string,
    public readonly code: "FILE_UNREADABLE" | "INVALID_FORMAT"
  ) {
    super(message);
    this.name = "WatchlistError";
  }
}

/**
 * @interface IWatchlistStore
 */
export interface IWatchlistStore {
  // ─── Queries ────────────────────────────────────────────────────

  /**
   * @query
   * @description Match a raw beacon id (as reported by a gateway) against
   * the watchlist. With auto-discovery enabled an unknown id is inserted
   * and reported as tracked.
   */
  resolve(rawBeaconId: string): WatchlistResolution;

  /**
   * @query
   * @description Same matching as {@link resolve}, without auto-discovery.
   */
  lookup(rawBeaconId: string): WatchlistEntry | null;

  /**
   * @query
   * @description Zone a gateway or sensor is installed in.
   * @returns null for unknown or absent gateways.
   */
  zoneOf(gatewayId: DeviceEui | null): ZoneId | null;

  /**
   * @query
   * @description Assigned home zone of a tracked beacon.
   */
  homeZoneOf(beaconId: BeaconId): ZoneId | null;

  /**
   * @query
   * @description Alarm device responsible for a zone, or the default
   * target when the zone is unknown or has none.
   */
  alarmDeviceFor(zoneId: ZoneId | null): DeviceEui;

  /**
   * @query
   * @description Display name for a beacon; generated for unknown ids.
   */
  displayNameOf(beaconId: BeaconId): string;

  /**
   * @query
   * @description The table currently in effect.
   */
  getTable(): WatchlistTable;

  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Atomically replace the table.
   * @postcondition Emits WATCHLIST_RELOADED.
   */
  reload(table: WatchlistTable): void;
}
