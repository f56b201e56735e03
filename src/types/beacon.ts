/**
 * @module types/beacon
 * @description Beacon observations and per-beacon alarm state.
 *
 * A beacon moves through five zones:
 *
 * | Zone    | Meaning                                               |
 * |---------|-------------------------------------------------------|
 * | UNKNOWN | never observed (or not yet initialized)               |
 * | SAFE    | last observation satisfied the safe-zone policy       |
 * | WEAK    | unsafe, debounce window still running (no alarm yet)  |
 * | ALARM   | unsafe long enough; trigger sequence issued           |
 * | LOST    | silent longer than the watchdog limit                 |
 */

import type { BeaconId, DeviceEui, EpochSeconds, ZoneId } from "./branded.js";

// ─── Zone ───────────────────────────────────────────────────────────

export const ZONES = ["UNKNOWN", "SAFE", "WEAK", "ALARM", "LOST"] as const;

export type Zone = (typeof ZONES)[number];

/**
 * Why an observation failed the safe-zone policy. When both hold,
 * WRONG_ZONE is reported.
 */
export type UnsafeReason = "WRONG_ZONE" | "WEAK_SIGNAL";

/**
 * Which side of the threshold counts as safe.
 * HIGHER_IS_SAFER (stronger signal = nearer) is the documented convention.
 */
export type RssiDirection = "HIGHER_IS_SAFER" | "LOWER_IS_SAFER";

// ─── Observation ────────────────────────────────────────────────────

/**
 * A single normalized beacon sighting, produced by the uplink normalizer.
 */
export interface BeaconObservation {
  readonly beaconId: BeaconId;
  /** Signal strength in dBm (signed integer). */
  readonly rssi: number;
  /** DevEUI of the gateway/sensor that heard the beacon, if reported. */
  readonly gatewayId: DeviceEui | null;
  readonly observedAt: EpochSeconds;
}

// ─── State ──────────────────────────────────────────────────────────

/**
 * Mutable per-beacon record. Owned exclusively by the state machine;
 * everything outside it sees {@link BeaconSnapshot} copies.
 */
export interface BeaconState {
  readonly beaconId: BeaconId;
  displayName: string;
  zone: Zone;
  lastRssi: number | null;
  lastSeen: EpochSeconds | null;
  /** Start of the current unsafe condition; null while safe. */
  weakSince: EpochSeconds | null;
  /** A trigger sequence was issued and not yet silenced. */
  alarmActive: boolean;
  initialized: boolean;
  homeZoneId: ZoneId | null;
  detectedZoneId: ZoneId | null;
  unsafeReason: UnsafeReason | null;
  /** Alarm device used for this beacon's most recent command. */
  targetDevice: DeviceEui | null;
}

/**
 * Read-only copy of a beacon's state, safe to hand to displays.
 */
export type BeaconSnapshot = Readonly<BeaconState>;

// ─── Policy ─────────────────────────────────────────────────────────

/**
 * Thresholds that decide SAFE vs unsafe, and how long unsafe must last.
 */
export interface SafetyPolicy {
  /** dBm boundary; equal to the threshold counts as safe. */
  readonly safeRssiThreshold: number;
  readonly rssiDirection: RssiDirection;
  readonly debounceSeconds: number;
  /** Require detected zone == home zone in addition to signal strength. */
  readonly topologyAware: boolean;
}

/**
 * Result of checking one observation against the policy.
 */
export interface SafetyAssessment {
  readonly safe: boolean;
  readonly reason: UnsafeReason | null;
  readonly detectedZoneId: ZoneId | null;
  readonly homeZoneId: ZoneId | null;
}
