/**
 * @module interfaces/state-machine
 * @description IBeaconStateMachine: per-beacon debounced SAFE/ALARM
 * decisions.
 *
 * One state record per tracked beacon, created on first observation and
 * kept until the beacon leaves the watchlist. Every mutation happens inside a
 * synchronous call, so the event loop serializes the inbound path and the
 * watchdog; commands are handed to the dispatcher and never awaited here.
 */

import type { BeaconId, EpochSeconds } from "../types/branded.js";
import type { BeaconObservation, BeaconSnapshot, Zone } from "../types/beacon.js";

/**
 * @interface IBeaconStateMachine
 */
export interface IBeaconStateMachine {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Fold one observation into the beacon's state.
   *
   * The first observation of a beacon always yields SAFE and a stop
   * command. Safe observations silence immediately; unsafe ones must
   * persist for the debounce window before the trigger sequence is issued,
   * at most once per rising edge of the alarm latch.
   *
   * @returns The beacon's zone after the observation. Never throws.
   * @postcondition May emit BEACON_INITIALIZED, BEACON_STATE_CHANGED,
   *   ALARM_TRIGGERED, ALARM_SILENCED.
   */
  evaluate(observation: BeaconObservation): Zone;

  /**
   * @command
   * @description Move a beacon to LOST, triggering the alarm unless it is
   * already latched.
   * @returns false when the beacon is unknown, never seen or already LOST.
   * @postcondition Emits BEACON_STATE_CHANGED and BEACON_LOST.
   */
  markLost(beaconId: BeaconId, now: EpochSeconds): boolean;

  /**
   * @command
   * @description Issue the trigger sequence for a beacon on operator
   * request and latch its alarm.
   */
  triggerManually(beaconId: BeaconId, now: EpochSeconds): void;

  /**
   * @command
   * @description Send a stop command and clear the alarm latch. Without a
   * beacon id, silences the default alarm device and clears every latch.
   */
  silenceManually(beaconId: BeaconId | null, now: EpochSeconds): void;

  /**
   * @command
   * @description Drop the state of every beacon the watchlist no longer
   * tracks. A latched alarm gets a stop command first.
   * @returns The dropped beacon ids.
   * @postcondition Emits ALARM_SILENCED for each dropped latched beacon.
   */
  forgetUntracked(isTracked: (beaconId: BeaconId) => boolean, now: EpochSeconds): BeaconId[];

  // ─── Queries ────────────────────────────────────────────────────

  /**
   * @query
   * @description Beacons whose last sighting is more than
   * `maxSilenceSeconds` before `now` and that are not already LOST.
   */
  findSilent(now: EpochSeconds, maxSilenceSeconds: number): BeaconId[];

  /**
   * @query
   * @description Frozen copy of one beacon's state.
   */
  getSnapshot(beaconId: BeaconId): BeaconSnapshot | null;

  /**
   * @query
   * @description Frozen copies of every beacon's state.
   */
  getAllSnapshots(): ReadonlyMap<BeaconId, BeaconSnapshot>;
}
