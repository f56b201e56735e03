/**
 * @module primitives/watchlist-store
 * @description Tracked beacons and physical topology.
 *
 * The store holds one immutable {@link WatchlistTable}. Reloads and
 * auto-discovery build a new table and swap it in with a single
 * assignment, so a lookup running between two swaps always sees one
 * consistent table.
 *
 * File format (`config/watchlist.json`):
 * ```json
 * {
 *   "beacons": [{ "id": "64AF", "name": "Resident A", "homeZone": "wing-a" }],
 *   "zones": [{ "id": "wing-a", "alarmDevice": "70b3d5a4d31205ce", "gateways": ["70b3d5a4d31205c5"] }]
 * }
 * ```
 * `beacons` may also be written as a plain `{ "<id>": "<name>" }` object.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { WatchlistError } from "../interfaces/watchlist.js";
import type { IWatchlistStore } from "../interfaces/watchlist.js";
import type { IEventBus } from "../interfaces/event-bus.js";
import type { BeaconId, DeviceEui, EpochSeconds, ZoneId } from "../types/branded.js";
import { nowSeconds, toBeaconId, toDeviceEui, toZoneId } from "../types/branded.js";
import type {
  WatchlistEntry,
  WatchlistResolution,
  WatchlistTable,
  ZoneDefinition,
} from "../types/topology.js";
import { minorIdOf } from "../codec/commands.js";
import { componentLogger } from "../config/logger.js";
import type { Logger } from "../config/logger.js";

// ─── File Schema ────────────────────────────────────────────────────

const BeaconEntrySchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().optional(),
  homeZone: z.string().trim().min(1).optional(),
});

const ZoneEntrySchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().optional(),
  alarmDevice: z.string().trim().min(1).optional(),
  gateways: z.array(z.string().trim().min(1)).default([]),
});

export const WatchlistFileSchema = z.object({
  beacons: z
    .union([
      z.array(BeaconEntrySchema),
      z
        .record(z.string())
        .transform((named) =>
          Object.entries(named).map(([id, name]) => ({ id, name, homeZone: undefined }))
        ),
    ])
    .default([]),
  zones: z.array(ZoneEntrySchema).default([]),
});

export type WatchlistFile = z.infer<typeof WatchlistFileSchema>;

// ─── Table Construction ─────────────────────────────────────────────

export function emptyTable(): WatchlistTable {
  return { beacons: new Map(), zones: new Map(), gatewayZones: new Map() };
}

/**
 * Build a lookup table from validated file contents.
 *
 * @throws {WatchlistError} code=INVALID_FORMAT when a gateway is listed in
 *   two zones or a beacon names a zone that is not defined.
 */
export function buildTable(file: WatchlistFile): WatchlistTable {
  const zones = new Map<ZoneId, ZoneDefinition>();
  const gatewayZones = new Map<DeviceEui, ZoneId>();

  for (const raw of file.zones) {
    const id = toZoneId(raw.id);
    const gateways = raw.gateways.map(toDeviceEui);
    for (const gateway of gateways) {
      const existing = gatewayZones.get(gateway);
      if (existing !== undefined && existing !== id) {
        throw new WatchlistError(
          `Gateway ${gateway} is assigned to both "${existing}" and "${id}"`,
          "INVALID_FORMAT"
        );
      }
      gatewayZones.set(gateway, id);
    }
    zones.set(id, {
      id,
      name: raw.name ?? raw.id,
      alarmDevice: raw.alarmDevice === undefined ? null : toDeviceEui(raw.alarmDevice),
      gateways,
    });
  }

  const beacons = new Map<BeaconId, WatchlistEntry>();
  for (const raw of file.beacons) {
    const beaconId = toBeaconId(raw.id);
    const homeZoneId = raw.homeZone === undefined ? null : toZoneId(raw.homeZone);
    if (homeZoneId !== null && !zones.has(homeZoneId)) {
      throw new WatchlistError(
        `Beacon ${beaconId} has undefined home zone "${homeZoneId}"`,
        "INVALID_FORMAT"
      );
    }
    beacons.set(beaconId, {
      beaconId,
      displayName: raw.name ?? `Beacon ${beaconId}`,
      homeZoneId,
    });
  }

  return { beacons, zones, gatewayZones };
}

/**
 * Read, validate and build a watchlist file.
 *
 * @throws {WatchlistError} FILE_UNREADABLE or INVALID_FORMAT.
 */
export async function loadWatchlistFile(path: string): Promise<WatchlistTable> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new WatchlistError(
      `Cannot read watchlist ${path}: ${err instanceof Error ? err.message : String(err)}`,
      "FILE_UNREADABLE"
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new WatchlistError(
      `Watchlist ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      "INVALID_FORMAT"
    );
  }

  const parsed = WatchlistFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new WatchlistError(
      `Watchlist ${path} is malformed: ${parsed.error.issues
        .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
        .join("; ")}`,
      "INVALID_FORMAT"
    );
  }
  return buildTable(parsed.data);
}

// ─── Store ──────────────────────────────────────────────────────────

export interface WatchlistStoreOptions {
  /** Alarm device used when a zone has none (or is unknown). */
  defaultAlarmDevice: DeviceEui;
  /** Initial table. Default: empty. */
  table?: WatchlistTable;
  /** Insert unknown beacons instead of ignoring them. Default: false */
  autoDiscover?: boolean;
  /** File read by {@link WatchlistStore.reloadFromFile}. */
  file?: string;
  clock?: () => EpochSeconds;
  logger?: Logger;
}

export class WatchlistStore implements IWatchlistStore {
  private table: WatchlistTable;
  private readonly defaultAlarmDevice: DeviceEui;
  private readonly autoDiscover: boolean;
  private readonly file: string | null;
  private readonly clock: () => EpochSeconds;
  private readonly logger: Logger;

  constructor(
    private readonly bus: IEventBus,
    options: WatchlistStoreOptions
  ) {
    this.table = options.table ?? emptyTable();
    this.defaultAlarmDevice = options.defaultAlarmDevice;
    this.autoDiscover = options.autoDiscover ?? false;
    this.file = options.file ?? null;
    this.clock = options.clock ?? nowSeconds;
    this.logger = componentLogger(options.logger, "watchlist");
  }

  // ─── Queries ────────────────────────────────────────────────────

  resolve(rawBeaconId: string): WatchlistResolution {
    const beaconId = toBeaconId(rawBeaconId);
    const entry = this.lookup(beaconId);
    if (entry) {
      return {
        tracked: true,
        beaconId: entry.beaconId,
        displayName: entry.displayName,
        discovered: false,
      };
    }
    if (this.autoDiscover && beaconId.length > 0) {
      return this.discover(beaconId);
    }
    return { tracked: false, beaconId };
  }

  lookup(rawBeaconId: string): WatchlistEntry | null {
    const beaconId = toBeaconId(rawBeaconId);
    const { beacons } = this.table;

    const exact = beacons.get(beaconId);
    if (exact) return exact;

    // Gateways report major+minor; the watchlist usually holds the minor.
    // The longest contained id wins when several match.
    let best: WatchlistEntry | null = null;
    for (const entry of beacons.values()) {
      if (entry.beaconId.length > 0 && beaconId.includes(entry.beaconId)) {
        if (best === null || entry.beaconId.length > best.beaconId.length) {
          best = entry;
        }
      }
    }
    // Short ids are stored padded to four digits by auto-discovery
    return best ?? beacons.get(toBeaconId(minorIdOf(beaconId))) ?? null;
  }

  zoneOf(gatewayId: DeviceEui | null): ZoneId | null {
    if (gatewayId === null) return null;
    return this.table.gatewayZones.get(gatewayId) ?? null;
  }

  homeZoneOf(beaconId: BeaconId): ZoneId | null {
    return this.table.beacons.get(beaconId)?.homeZoneId ?? null;
  }

  alarmDeviceFor(zoneId: ZoneId | null): DeviceEui {
    if (zoneId === null) return this.defaultAlarmDevice;
    return this.table.zones.get(zoneId)?.alarmDevice ?? this.defaultAlarmDevice;
  }

  displayNameOf(beaconId: BeaconId): string {
    return this.table.beacons.get(beaconId)?.displayName ?? `Beacon ${beaconId}`;
  }

  getTable(): WatchlistTable {
    return this.table;
  }

  // ─── Commands ───────────────────────────────────────────────────

  reload(table: WatchlistTable): void {
    this.table = table;
    this.logger.info(
      { beacons: table.beacons.size, zones: table.zones.size },
      "watchlist loaded"
    );
    this.bus.emit({
      type: "WATCHLIST_RELOADED",
      beaconCount: table.beacons.size,
      zoneCount: table.zones.size,
      timestamp: this.clock(),
    });
  }

  /**
   * Re-read the configured file. On failure the current table stays in
   * effect and the error is logged.
   *
   * @returns true when a new table was installed.
   */
  async reloadFromFile(): Promise<boolean> {
    if (this.file === null) {
      this.logger.warn("no watchlist file configured; keeping current table");
      return false;
    }
    try {
      this.reload(await loadWatchlistFile(this.file));
      return true;
    } catch (err) {
      this.logger.warn({ err, file: this.file }, "watchlist reload failed; keeping current table");
      return false;
    }
  }

  private discover(beaconId: BeaconId): WatchlistResolution {
    const minor = toBeaconId(minorIdOf(beaconId));
    const entry: WatchlistEntry = {
      beaconId: minor,
      displayName: `Auto-Discovered ${minor}`,
      homeZoneId: null,
    };

    const beacons = new Map(this.table.beacons);
    beacons.set(minor, entry);
    this.table = { ...this.table, beacons };

    this.logger.warn({ beaconId: minor, reported: beaconId }, "new beacon discovered");
    this.bus.emit({
      type: "BEACON_DISCOVERED",
      beaconId: minor,
      displayName: entry.displayName,
      timestamp: this.clock(),
    });
    return { tracked: true, beaconId: minor, displayName: entry.displayName, discovered: true };
  }
}
