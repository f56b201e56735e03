/**
 * @module __tests__/command-dispatcher.test
 * @description Tests for per-device downlink queues: step order, delays,
 * failure handling and sequence numbering.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { CommandDispatcher } from "../src/primitives/command-dispatcher.js";
import type { CommandDispatcherConfig } from "../src/primitives/command-dispatcher.js";
import { AlarmEventBus } from "../src/primitives/event-bus.js";
import { CommandBuilder } from "../src/codec/commands.js";
import { InMemoryDownlinkTransport } from "../src/transports/in-memory.js";
import { toBeaconId } from "../src/types/branded.js";
import { DEVICE_A, DEVICE_B, EventRecorder, instantSleep, silent } from "./fixtures.js";

const BEACON = toBeaconId("64AF");

/** Wait until every pending microtask and immediate has run. */
const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe("CommandDispatcher", () => {
  let bus: AlarmEventBus;
  let events: EventRecorder;
  let transport: InMemoryDownlinkTransport;
  let builder: CommandBuilder;

  beforeEach(() => {
    bus = new AlarmEventBus(silent);
    events = new EventRecorder(bus);
    transport = new InMemoryDownlinkTransport();
    builder = new CommandBuilder();
  });

  function dispatcherWith(config: CommandDispatcherConfig = {}): CommandDispatcher {
    return new CommandDispatcher(transport, builder, bus, {
      sleep: instantSleep,
      clock: () => 100,
      logger: silent,
      ...config,
    });
  }

  it("sends a single mute as the stop command", async () => {
    const dispatcher = dispatcherWith();

    dispatcher.sendStop(DEVICE_A);
    await dispatcher.whenIdle();

    expect(transport.sent).toEqual([{ target: DEVICE_A, payloadHex: "B0000100", port: 10 }]);
    expect(events.ofType("DOWNLINK_SENT")).toEqual([
      {
        type: "DOWNLINK_SENT",
        targetDevice: DEVICE_A,
        command: "MUTE",
        payloadHex: "B0000100",
        port: 10,
        timestamp: 100,
      },
    ]);
  });

  it("runs volume, duration and search with a delay between steps", async () => {
    const sleep = vi.fn(instantSleep);
    const dispatcher = dispatcherWith({ sleep });

    dispatcher.runTriggerSequence(DEVICE_A, BEACON);
    await dispatcher.whenIdle();

    expect(transport.payloads()).toEqual(["B0000104", "B0000206", "AC0064AF"]);
    expect(sleep.mock.calls).toEqual([[2000], [2000]]);
  });

  it("uses the configured port, volume and duration", async () => {
    const dispatcher = dispatcherWith({
      fPort: 12,
      volumeLevel: 3,
      durationUnits: 12,
      commandDelaySeconds: 0.5,
      sleep: vi.fn(instantSleep),
    });

    dispatcher.runTriggerSequence(DEVICE_A, BEACON);
    await dispatcher.whenIdle();

    expect(transport.sent.map((s) => [s.payloadHex, s.port])).toEqual([
      ["B0000103", 12],
      ["B000020C", 12],
      ["AC0064AF", 12],
    ]);
  });

  it("queues a stop behind a running sequence for the same device", async () => {
    const sleep = vi.fn(instantSleep);
    const dispatcher = dispatcherWith({ sleep });

    dispatcher.runTriggerSequence(DEVICE_A, BEACON);
    dispatcher.sendStop(DEVICE_A);
    await dispatcher.whenIdle();

    expect(transport.payloads()).toEqual(["B0000104", "B0000206", "AC0064AF", "B0000100"]);
    // two gaps inside the sequence, one before the queued stop
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(dispatcher.busyDevices).toBe(0);
  });

  it("does not make other devices wait", async () => {
    const gates: Array<() => void> = [];
    const dispatcher = dispatcherWith({
      sleep: () => new Promise<void>((resolve) => gates.push(resolve)),
    });

    dispatcher.runTriggerSequence(DEVICE_A, BEACON);
    dispatcher.sendStop(DEVICE_B);
    await flush();

    // device A is parked in its first delay; device B already got its stop
    expect(transport.sent.map((s) => [s.target, s.payloadHex])).toEqual([
      [DEVICE_A, "B0000104"],
      [DEVICE_B, "B0000100"],
    ]);

    while (gates.length > 0) {
      gates.shift()?.();
      await flush();
    }
    await dispatcher.whenIdle();
    expect(transport.payloads(DEVICE_A)).toEqual(["B0000104", "B0000206", "AC0064AF"]);
  });

  it("logs a failed step and continues the sequence", async () => {
    const dispatcher = dispatcherWith();
    transport.failWith("PUBLISH_FAILED");

    dispatcher.runTriggerSequence(DEVICE_A, BEACON);
    await dispatcher.whenIdle();

    expect(transport.payloads()).toEqual(["B0000206", "AC0064AF"]);
    expect(events.ofType("DOWNLINK_FAILED")).toEqual([
      {
        type: "DOWNLINK_FAILED",
        targetDevice: DEVICE_A,
        command: "SET_VOLUME",
        error: "injected PUBLISH_FAILED",
        timestamp: 100,
      },
    ]);
    expect(events.ofType("DOWNLINK_SENT")).toHaveLength(2);
  });

  it("reports a beacon id that cannot be encoded", async () => {
    const dispatcher = dispatcherWith();

    dispatcher.runTriggerSequence(DEVICE_A, toBeaconId("XYZ"));
    await dispatcher.whenIdle();

    expect(transport.payloads()).toEqual(["B0000104", "B0000206"]);
    expect(events.ofType("DOWNLINK_FAILED").map((e) => e.command)).toEqual(["SEARCH_BEACON"]);
    expect(builder.peekSequence()).toBe(0);
  });

  it("numbers searches in send order", async () => {
    const dispatcher = dispatcherWith();

    dispatcher.runTriggerSequence(DEVICE_A, BEACON);
    dispatcher.runTriggerSequence(DEVICE_B, toBeaconId("64B0"));
    await dispatcher.whenIdle();

    const searches = transport.payloads().filter((p) => p.startsWith("AC"));
    expect(searches).toEqual(["AC0064AF", "AC0164B0"]);
  });

  it("resolves whenIdle immediately with nothing queued", async () => {
    await expect(dispatcherWith().whenIdle()).resolves.toBeUndefined();
  });
});
