/**
 * @module __tests__/in-memory-transport.test
 * @description Tests for the recording transport: bounded history and
 * injected failures.
 */

import { describe, it, expect } from "vitest";
import { InMemoryDownlinkTransport } from "../src/transports/in-memory.js";
import { DownlinkError } from "../src/interfaces/downlink.js";
import { DEVICE_A, DEVICE_B } from "./fixtures.js";

const frame = (byte: number): Uint8Array => new Uint8Array([0xb0, 0x00, 0x01, byte]);

describe("InMemoryDownlinkTransport", () => {
  it("keeps only the latest sends up to the history limit", async () => {
    const transport = new InMemoryDownlinkTransport(undefined, { historyLimit: 2 });

    await transport.send(DEVICE_A, frame(0), 10);
    await transport.send(DEVICE_B, frame(1), 10);
    await transport.send(DEVICE_A, frame(4), 12);

    expect(transport.sent).toEqual([
      { target: DEVICE_B, payloadHex: "B0000101", port: 10 },
      { target: DEVICE_A, payloadHex: "B0000104", port: 12 },
    ]);
    expect(transport.payloads(DEVICE_A)).toEqual(["B0000104"]);
  });

  it("records nothing with a zero limit", async () => {
    const transport = new InMemoryDownlinkTransport(undefined, { historyLimit: 0 });

    await transport.send(DEVICE_A, frame(0), 10);

    expect(transport.sent).toEqual([]);
  });

  it("rejects the requested number of sends, then recovers", async () => {
    const transport = new InMemoryDownlinkTransport();
    transport.failWith("NOT_CONNECTED", 1);

    await expect(transport.send(DEVICE_A, frame(0), 10)).rejects.toBeInstanceOf(DownlinkError);
    await transport.send(DEVICE_A, frame(0), 10);

    expect(transport.payloads()).toEqual(["B0000100"]);
  });
});
