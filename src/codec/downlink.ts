/**
 * @module codec/downlink
 * @description ChirpStack v4 downlink envelope.
 *
 * Published as JSON on `application/<applicationId>/device/<devEui>/command/down`.
 * Downlinks are unconfirmed; the macro sensor treats its commands as
 * idempotent and a lost one is corrected on the next cycle.
 */

import type { DeviceEui } from "../types/branded.js";

export const UPLINK_TOPIC = "application/+/device/+/event/up";

export interface ChirpStackDownlink {
  readonly devEui: string;
  readonly confirmed: boolean;
  readonly fPort: number;
  /** Base64-encoded application payload. */
  readonly data: string;
}

export function encodeDownlinkEnvelope(
  target: DeviceEui,
  payload: Uint8Array,
  port: number
): ChirpStackDownlink {
  return {
    devEui: target,
    confirmed: false,
    fPort: port,
    data: Buffer.from(payload).toString("base64"),
  };
}

export function downlinkTopic(applicationId: string, target: DeviceEui): string {
  return `application/${applicationId}/device/${target}/command/down`;
}

/**
 * Pull the application id out of a concrete uplink topic
 * (`application/<id>/device/<eui>/event/up`).
 */
export function applicationIdFromTopic(topic: string): string | null {
  const parts = topic.split("/");
  if (parts.length < 4 || parts[0] !== "application" || parts[2] !== "device") {
    return null;
  }
  return parts[1] || null;
}
