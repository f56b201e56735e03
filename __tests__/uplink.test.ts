/**
 * @module __tests__/uplink.test
 * @description Tests for ChirpStack uplink normalization and downlink
 * envelopes.
 */

import { describe, it, expect } from "vitest";
import {
  UplinkError,
  normalizeUplink,
  parseUplinkMessage,
} from "../src/codec/uplink.js";
import {
  applicationIdFromTopic,
  downlinkTopic,
  encodeDownlinkEnvelope,
} from "../src/codec/downlink.js";
import { toDeviceEui } from "../src/types/branded.js";
import { captureError } from "./fixtures.js";

const gatewayReport = {
  deviceInfo: {
    applicationId: "app-1",
    devEui: "70B3D5A4D31205C5",
    deviceName: "ward-gateway",
  },
  fPort: 5,
  object: {
    beacon1: "001064af",
    rssi1: -42,
    beacon2: "001064B0",
    rssi2: -999,
    beacon3: "001064B1",
    beacon4: 1234,
    rssi4: "-77",
    beacon11: "001064B2",
    rssi11: -40,
  },
};

describe("normalizeUplink", () => {
  it("extracts complete beacon slots and drops missing readings", () => {
    const report = normalizeUplink(gatewayReport, 100);

    expect(report.applicationId).toBe("app-1");
    expect(report.gatewayId).toBe("70b3d5a4d31205c5");
    expect(report.observations).toEqual([
      { beaconId: "001064AF", rssi: -42, gatewayId: "70b3d5a4d31205c5", observedAt: 100 },
      { beaconId: "1234", rssi: -77, gatewayId: "70b3d5a4d31205c5", observedAt: 100 },
    ]);
  });

  it("accepts events without device info or decoded object", () => {
    const report = normalizeUplink({ fPort: 5 }, 100);
    expect(report).toEqual({ applicationId: null, gatewayId: null, observations: [] });
  });

  it("rejects values that are not uplink events", () => {
    expect(() => normalizeUplink("hello", 100)).toThrow(UplinkError);
    expect(() => normalizeUplink({ object: "not-an-object" }, 100)).toThrow(UplinkError);
    const err = captureError(() =>
      normalizeUplink({ deviceInfo: { applicationId: "app-1" } }, 100)
    );
    expect(err).toBeInstanceOf(UplinkError);
    expect(err).toMatchObject({ code: "INVALID_SHAPE" });
  });
});

describe("parseUplinkMessage", () => {
  it("parses bytes as UTF-8 JSON", () => {
    expect(parseUplinkMessage(new TextEncoder().encode('{"fPort":5}'))).toEqual({ fPort: 5 });
  });

  it("reports malformed JSON", () => {
    const err = captureError(() => parseUplinkMessage("{not json"));
    expect(err).toBeInstanceOf(UplinkError);
    expect(err).toMatchObject({ code: "INVALID_JSON" });
  });
});

describe("downlink envelope", () => {
  const device = toDeviceEui("70B3D5A4D31205CE");

  it("base64-encodes the payload as an unconfirmed downlink", () => {
    expect(encodeDownlinkEnvelope(device, Uint8Array.of(0xb0, 0x00, 0x01, 0x00), 10)).toEqual({
      devEui: "70b3d5a4d31205ce",
      confirmed: false,
      fPort: 10,
      data: "sAABAA==",
    });
  });

  it("builds the command topic", () => {
    expect(downlinkTopic("app-1", device)).toBe(
      "application/app-1/device/70b3d5a4d31205ce/command/down"
    );
  });

  it("reads the application id from an uplink topic", () => {
    expect(applicationIdFromTopic("application/app-9/device/70b3d5a4d31205c5/event/up")).toBe(
      "app-9"
    );
    expect(applicationIdFromTopic("gateway/abc/event/up")).toBeNull();
  });
});
