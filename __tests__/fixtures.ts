/**
 * @module __tests__/fixtures
 * @description Shared test doubles: silent logger, instant sleep, table
 * builder and an event recorder.
 */

import { pino } from "pino";
import { toDeviceEui } from "../src/types/branded.js";
import type { WatchlistTable } from "../src/types/topology.js";
import type {
  MonitorEvent,
  MonitorEventMap,
  MonitorEventType,
} from "../src/types/events.js";
import type { IEventBus } from "../src/interfaces/event-bus.js";
import { WatchlistFileSchema, buildTable } from "../src/primitives/watchlist-store.js";
import type { z } from "zod";

export const silent = pino({ level: "silent" });

export const instantSleep = (): Promise<void> => Promise.resolve();

export const DEFAULT_DEVICE = toDeviceEui("70b3d5a4d31205ce");
export const DEVICE_A = toDeviceEui("70b3d5a4d31205a1");
export const DEVICE_B = toDeviceEui("70b3d5a4d31205b1");
export const GATEWAY_A = toDeviceEui("70b3d5a4d31205c5");
export const GATEWAY_B = toDeviceEui("70b3d5a4d31205c6");

export function tableOf(file: z.input<typeof WatchlistFileSchema>): WatchlistTable {
  return buildTable(WatchlistFileSchema.parse(file));
}

/** Two wings, one resident each. */
export function twoWingTable(): WatchlistTable {
  return tableOf({
    beacons: [
      { id: "64AF", name: "Resident A", homeZone: "wing-a" },
      { id: "64B0", name: "Resident B", homeZone: "wing-b" },
    ],
    zones: [
      { id: "wing-a", alarmDevice: DEVICE_A, gateways: [GATEWAY_A] },
      { id: "wing-b", alarmDevice: DEVICE_B, gateways: [GATEWAY_B] },
    ],
  });
}

const ALL_EVENT_TYPES: readonly MonitorEventType[] = [
  "BEACON_INITIALIZED",
  "BEACON_STATE_CHANGED",
  "BEACON_LOST",
  "BEACON_DISCOVERED",
  "ALARM_TRIGGERED",
  "ALARM_SILENCED",
  "DOWNLINK_SENT",
  "DOWNLINK_FAILED",
  "WATCHLIST_RELOADED",
];

/**
 * Records every event published on a bus, in delivery order.
 */
export class EventRecorder {
  readonly events: MonitorEvent[] = [];

  constructor(bus: IEventBus) {
    for (const type of ALL_EVENT_TYPES) {
      bus.on(type, (event) => this.events.push(event));
    }
  }

  types(): MonitorEventType[] {
    return this.events.map((e) => e.type);
  }

  ofType<T extends MonitorEventType>(type: T): MonitorEventMap[T][] {
    return this.events.filter((e): e is MonitorEventMap[T] => e.type === type);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/** Run fn and return what it threw. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}
