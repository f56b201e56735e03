/**
 * @module __tests__/watchlist-store.test
 * @description Tests for watchlist matching, topology lookups, file
 * loading, atomic reload and auto-discovery.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  WatchlistStore,
  emptyTable,
  loadWatchlistFile,
} from "../src/primitives/watchlist-store.js";
import { AlarmEventBus } from "../src/primitives/event-bus.js";
import { WatchlistError } from "../src/interfaces/watchlist.js";
import { toBeaconId, toDeviceEui, toZoneId } from "../src/types/branded.js";
import {
  DEFAULT_DEVICE,
  DEVICE_A,
  EventRecorder,
  GATEWAY_A,
  GATEWAY_B,
  captureError,
  silent,
  tableOf,
  twoWingTable,
} from "./fixtures.js";

describe("WatchlistStore", () => {
  let bus: AlarmEventBus;
  let events: EventRecorder;

  beforeEach(() => {
    bus = new AlarmEventBus(silent);
    events = new EventRecorder(bus);
  });

  function storeWith(options: { autoDiscover?: boolean; file?: string } = {}): WatchlistStore {
    return new WatchlistStore(bus, {
      defaultAlarmDevice: DEFAULT_DEVICE,
      table: twoWingTable(),
      clock: () => 500,
      logger: silent,
      ...options,
    });
  }

  describe("resolve", () => {
    it("matches ids exactly, case-insensitively", () => {
      expect(storeWith().resolve("64af")).toEqual({
        tracked: true,
        beaconId: "64AF",
        displayName: "Resident A",
        discovered: false,
      });
    });

    it("matches a reported major+minor against a tracked minor", () => {
      const resolution = storeWith().resolve("001064AF");
      expect(resolution).toMatchObject({ tracked: true, beaconId: "64AF" });
    });

    it("prefers the longest contained id", () => {
      const store = new WatchlistStore(bus, {
        defaultAlarmDevice: DEFAULT_DEVICE,
        table: tableOf({ beacons: [{ id: "64AF" }, { id: "1064AF", name: "Exact Major" }] }),
      });
      expect(store.resolve("001064AF")).toMatchObject({
        tracked: true,
        beaconId: "1064AF",
        displayName: "Exact Major",
      });
    });

    it("reports unknown ids as untracked without changing the table", () => {
      const store = storeWith();
      const before = store.getTable();

      expect(store.resolve("001099ff")).toEqual({ tracked: false, beaconId: "001099FF" });
      expect(store.getTable()).toBe(before);
      expect(events.events).toHaveLength(0);
    });

    it("inserts unknown ids under their minor when auto-discovery is on", () => {
      const store = storeWith({ autoDiscover: true });

      expect(store.resolve("0010abcd")).toEqual({
        tracked: true,
        beaconId: "ABCD",
        displayName: "Auto-Discovered ABCD",
        discovered: true,
      });
      expect(events.ofType("BEACON_DISCOVERED")).toEqual([
        {
          type: "BEACON_DISCOVERED",
          beaconId: "ABCD",
          displayName: "Auto-Discovered ABCD",
          timestamp: 500,
        },
      ]);

      // Second sighting matches the new entry
      expect(store.resolve("0010ABCD")).toMatchObject({ beaconId: "ABCD", discovered: false });
      expect(events.ofType("BEACON_DISCOVERED")).toHaveLength(1);
      expect(store.getTable().beacons.size).toBe(3);
    });

    it("finds a short discovered id again under its padded minor", () => {
      const store = storeWith({ autoDiscover: true });

      expect(store.resolve("ab")).toMatchObject({ beaconId: "00AB", discovered: true });
      expect(store.resolve("AB")).toEqual({
        tracked: true,
        beaconId: "00AB",
        displayName: "Auto-Discovered 00AB",
        discovered: false,
      });
      expect(store.lookup("AB")?.beaconId).toBe("00AB");
      expect(events.ofType("BEACON_DISCOVERED")).toHaveLength(1);
    });

    it("lookup never auto-discovers", () => {
      const store = storeWith({ autoDiscover: true });
      expect(store.lookup("0010ABCD")).toBeNull();
      expect(store.getTable().beacons.size).toBe(2);
    });
  });

  describe("topology", () => {
    it("maps gateways to zones", () => {
      const store = storeWith();
      expect(store.zoneOf(GATEWAY_A)).toBe("wing-a");
      expect(store.zoneOf(GATEWAY_B)).toBe("wing-b");
      expect(store.zoneOf(toDeviceEui("FFFFFFFFFFFFFFFF"))).toBeNull();
      expect(store.zoneOf(null)).toBeNull();
    });

    it("reports home zones and display names", () => {
      const store = storeWith();
      expect(store.homeZoneOf(toBeaconId("64B0"))).toBe("wing-b");
      expect(store.homeZoneOf(toBeaconId("9999"))).toBeNull();
      expect(store.displayNameOf(toBeaconId("64B0"))).toBe("Resident B");
      expect(store.displayNameOf(toBeaconId("9999"))).toBe("Beacon 9999");
    });

    it("falls back to the default alarm device", () => {
      const store = new WatchlistStore(bus, {
        defaultAlarmDevice: DEFAULT_DEVICE,
        table: tableOf({
          zones: [
            { id: "wing-a", alarmDevice: DEVICE_A, gateways: [] },
            { id: "hall", gateways: [] },
          ],
        }),
      });
      expect(store.alarmDeviceFor(toZoneId("wing-a"))).toBe(DEVICE_A);
      expect(store.alarmDeviceFor(toZoneId("hall"))).toBe(DEFAULT_DEVICE);
      expect(store.alarmDeviceFor(toZoneId("nowhere"))).toBe(DEFAULT_DEVICE);
      expect(store.alarmDeviceFor(null)).toBe(DEFAULT_DEVICE);
    });
  });

  describe("table construction", () => {
    it("accepts the name-map form of beacons", () => {
      const table = tableOf({ beacons: { "64af": "Resident A" } });
      expect(table.beacons.get(toBeaconId("64AF"))).toEqual({
        beaconId: "64AF",
        displayName: "Resident A",
        homeZoneId: null,
      });
    });

    it("rejects a gateway assigned to two zones", () => {
      const err = captureError(() =>
        tableOf({
          zones: [
            { id: "a", gateways: [GATEWAY_A] },
            { id: "b", gateways: [GATEWAY_A.toUpperCase()] },
          ],
        })
      );
      expect(err).toBeInstanceOf(WatchlistError);
      expect(err).toMatchObject({ code: "INVALID_FORMAT" });
    });

    it("rejects a beacon whose home zone is not defined", () => {
      const err = captureError(() => tableOf({ beacons: [{ id: "64AF", homeZone: "attic" }] }));
      expect(err).toMatchObject({ code: "INVALID_FORMAT" });
    });
  });

  describe("files", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "watchlist-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("loads a watchlist file", async () => {
      const file = join(dir, "watchlist.json");
      await writeFile(
        file,
        JSON.stringify({
          beacons: [{ id: "64af", name: "Resident A", homeZone: "wing-a" }],
          zones: [{ id: "wing-a", gateways: ["70B3D5A4D31205C5"] }],
        })
      );

      const table = await loadWatchlistFile(file);
      expect([...table.beacons.keys()]).toEqual(["64AF"]);
      expect(table.gatewayZones.get(GATEWAY_A)).toBe("wing-a");
      expect(table.zones.get(toZoneId("wing-a"))).toEqual({
        id: "wing-a",
        name: "wing-a",
        alarmDevice: null,
        gateways: ["70b3d5a4d31205c5"],
      });
    });

    it("reports missing, malformed and invalid files", async () => {
      await expect(loadWatchlistFile(join(dir, "absent.json"))).rejects.toMatchObject({
        code: "FILE_UNREADABLE",
      });

      const broken = join(dir, "broken.json");
      await writeFile(broken, "{ beacons: ");
      await expect(loadWatchlistFile(broken)).rejects.toMatchObject({ code: "INVALID_FORMAT" });

      const wrong = join(dir, "wrong.json");
      await writeFile(wrong, JSON.stringify({ beacons: 5 }));
      await expect(loadWatchlistFile(wrong)).rejects.toMatchObject({ code: "INVALID_FORMAT" });
    });

    it("reloads from file and keeps the old table on failure", async () => {
      const file = join(dir, "watchlist.json");
      await writeFile(file, JSON.stringify({ beacons: [{ id: "ABCD" }] }));
      const store = new WatchlistStore(bus, {
        defaultAlarmDevice: DEFAULT_DEVICE,
        file,
        clock: () => 42,
        logger: silent,
      });

      expect(await store.reloadFromFile()).toBe(true);
      expect(events.ofType("WATCHLIST_RELOADED")).toEqual([
        { type: "WATCHLIST_RELOADED", beaconCount: 1, zoneCount: 0, timestamp: 42 },
      ]);
      const loaded = store.getTable();

      await writeFile(file, "not json");
      expect(await store.reloadFromFile()).toBe(false);
      expect(store.getTable()).toBe(loaded);
      expect(events.ofType("WATCHLIST_RELOADED")).toHaveLength(1);
    });

    it("declines to reload without a configured file", async () => {
      const store = new WatchlistStore(bus, { defaultAlarmDevice: DEFAULT_DEVICE });
      expect(await store.reloadFromFile()).toBe(false);
      expect(store.getTable().beacons.size).toBe(0);
    });
  });

  it("reload swaps the whole table", () => {
    const store = storeWith();
    const old = store.getTable();
    const next = emptyTable();

    store.reload(next);

    expect(store.getTable()).toBe(next);
    expect(old.beacons.size).toBe(2);
    expect(store.resolve("64AF")).toMatchObject({ tracked: false });
  });
});
