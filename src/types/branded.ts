/**
 * @module types/branded
 * @description Branded identifiers used across the safe-zone monitor.
 *
 * Beacon ids, device EUIs and zone ids all travel as plain strings on the
 * wire. Branding them keeps a gateway EUI from being looked up as a beacon
 * id (or a raw, un-normalized id from reaching the state table) at compile
 * time. Values are only minted through the `to*` constructors below, which
 * also apply the canonical casing.
 *
 * @example
 * ```ts
 * const raw = "64af";
 * // Type error: string is not assignable to BeaconId
 * const id: BeaconId = raw;
 * // Correct:
 * const id = toBeaconId(raw); // "64AF"
 * ```
 */

/** Unique symbol for branding. Not exported; internal only. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

/**
 * A tracked beacon identifier, upper-case hex (e.g. "64AF" or "001064AF").
 */
export type BeaconId = Brand<string, "BeaconId">;

/**
 * A LoRaWAN DevEUI, lower-case hex. Used for both reporting gateways
 * and alarm-capable macro sensors.
 */
export type DeviceEui = Brand<string, "DeviceEui">;

/**
 * A physical zone (floor, wing, room) identifier from the topology file.
 */
export type ZoneId = Brand<string, "ZoneId">;

/**
 * Epoch time in seconds. Fractions are allowed; debounce and silence
 * windows are compared at sub-second precision.
 */
export type EpochSeconds = number;

// ─── Constructors ───────────────────────────────────────────────────

export function toBeaconId(raw: string): BeaconId {
  return raw.trim().toUpperCase() as BeaconId;
}

export function toDeviceEui(raw: string): DeviceEui {
  return raw.trim().toLowerCase() as DeviceEui;
}

export function toZoneId(raw: string): ZoneId {
  return raw.trim() as ZoneId;
}

/**
 * Current wall-clock time as {@link EpochSeconds}.
 */
export function nowSeconds(): EpochSeconds {
  return Date.now() / 1000;
}
