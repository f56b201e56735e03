/**
 * @module codec/uplink
 * @description Uplink normalizer for ChirpStack v4 event messages.
 *
 * The Bluetooth gateway's payload decoder (running in ChirpStack) reports
 * up to ten sightings per uplink as numbered slots in `object`:
 *
 * ```json
 * {
 *   "deviceInfo": { "applicationId": "…", "devEui": "70b3d5a4d31205c5" },
 *   "object": { "beacon1": "001064AF", "rssi1": -42, "beacon2": "001064B0", "rssi2": -88 }
 * }
 * ```
 *
 * Schemas are the source of truth; types are derived with z.infer<>.
 * Slots without a usable RSSI are dropped here so the state machine only
 * ever sees complete observations.
 */

import { z } from "zod";
import { toBeaconId, toDeviceEui } from "../types/branded.js";
import type { DeviceEui, EpochSeconds } from "../types/branded.js";
import type { BeaconObservation } from "../types/beacon.js";

/** Highest numbered beacon slot a gateway report may carry. */
export const MAX_BEACON_SLOTS = 10;

/** RSSI the gateway decoder writes when a slot has no reading. */
const RSSI_MISSING = -999;

/**
 * Errors raised while decoding an uplink.
 */
export class UplinkError extends Error {
  constructor(
    message: string,
    public readonly code: "INVALID_JSON" | "INVALID_SHAPE"
  ) {
    super(message);
    this.name = "UplinkError";
  }
}

// ─── Schemas ────────────────────────────────────────────────────────

export const DeviceInfoSchema = z
  .object({
    applicationId: z.string().min(1),
    devEui: z.string().min(1),
    deviceName: z.string().optional(),
  })
  .passthrough();

export const UplinkEventSchema = z
  .object({
    time: z.string().optional(),
    deviceInfo: DeviceInfoSchema.optional(),
    fPort: z.number().int().optional(),
    data: z.string().optional(),
    object: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type UplinkEvent = z.infer<typeof UplinkEventSchema>;

const SlotIdSchema = z.union([z.string().min(1), z.number()]).transform(String);
// Decoders emit numbers; some emit numeric strings
const SlotRssiSchema = z.preprocess(
  (v) => (typeof v === "string" && v.trim() !== "" ? Number(v) : v),
  z.number().int().gt(RSSI_MISSING)
);

// ─── Normalized Output ──────────────────────────────────────────────

/**
 * A decoded uplink: who sent it and what it saw.
 */
export interface UplinkReport {
  /** ChirpStack application of the reporting device, used for downlinks. */
  readonly applicationId: string | null;
  /** DevEUI of the reporting gateway. */
  readonly gatewayId: DeviceEui | null;
  readonly observations: readonly BeaconObservation[];
}

// ─── Decoding ───────────────────────────────────────────────────────

/**
 * Parse a raw MQTT message body.
 * @throws {UplinkError} code=INVALID_JSON
 */
export function parseUplinkMessage(raw: Uint8Array | string): unknown {
  const text = typeof raw === "string" ? raw : Buffer.from(raw).toString("utf8");
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new UplinkError(
      `Uplink is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      "INVALID_JSON"
    );
  }
}

/**
 * Validate a ChirpStack uplink event and extract beacon observations.
 *
 * @param message - Parsed JSON body of an `…/event/up` message.
 * @param receivedAt - Processing time stamped onto every observation.
 * @throws {UplinkError} code=INVALID_SHAPE when the event does not match
 *   the schema.
 */
export function normalizeUplink(
  message: unknown,
  receivedAt: EpochSeconds
): UplinkReport {
  const parsed = UplinkEventSchema.safeParse(message);
  if (!parsed.success) {
    throw new UplinkError(
      `Uplink does not match the event schema: ${parsed.error.issues
        .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
        .join("; ")}`,
      "INVALID_SHAPE"
    );
  }

  const event = parsed.data;
  const gatewayId = event.deviceInfo ? toDeviceEui(event.deviceInfo.devEui) : null;
  const observations: BeaconObservation[] = [];

  const slots = event.object ?? {};
  for (let i = 1; i <= MAX_BEACON_SLOTS; i++) {
    const id = SlotIdSchema.safeParse(slots[`beacon${i}`]);
    if (!id.success) continue;
    const rssi = SlotRssiSchema.safeParse(slots[`rssi${i}`]);
    if (!rssi.success) continue;

    observations.push({
      beaconId: toBeaconId(id.data),
      rssi: rssi.data,
      gatewayId,
      observedAt: receivedAt,
    });
  }

  return {
    applicationId: event.deviceInfo?.applicationId ?? null,
    gatewayId,
    observations,
  };
}
