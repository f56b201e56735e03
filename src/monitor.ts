/**
 * @module monitor
 * @description BeaconMonitor, the orchestrator that owns and wires every
 * component of the safe-zone monitor.
 *
 * A BeaconMonitor instance manages:
 * - Watchlist (tracked beacons, topology, auto-discovery)
 * - State machine (per-beacon debounced SAFE/WEAK/ALARM/LOST)
 * - Dispatcher (per-device downlink queues over the given transport)
 * - Watchdog (silence sweep on its own timer)
 * - Event bus, display and hooks
 *
 * @example
 * ```ts
 * const bridge = new ChirpStackMqttBridge(connectMqttSession({ url }));
 * const monitor = new BeaconMonitor({ settings, transport: bridge, display });
 * bridge.onUplink((report) => monitor.handleReport(report));
 * await monitor.start();
 * await bridge.start();
 * ```
 */

import { AlarmEventBus } from "./primitives/event-bus.js";
import { WatchlistStore } from "./primitives/watchlist-store.js";
import { CommandDispatcher } from "./primitives/command-dispatcher.js";
import { BeaconStateMachine } from "./primitives/beacon-state-machine.js";
import { Watchdog } from "./primitives/watchdog.js";
import { InMemoryDownlinkTransport } from "./transports/in-memory.js";
import { CommandBuilder } from "./codec/commands.js";
import { UplinkError, normalizeUplink } from "./codec/uplink.js";
import type { UplinkReport } from "./codec/uplink.js";
import { wire } from "./forwarder.js";
import type { AlarmHooks, ForwarderHandle } from "./forwarder.js";
import { defaultSettings } from "./config/settings.js";
import type { Settings } from "./config/settings.js";
import { componentLogger } from "./config/logger.js";
import type { Logger } from "./config/logger.js";
import type { EventListener } from "./interfaces/event-bus.js";
import type { IDownlinkTransport } from "./interfaces/downlink.js";
import type { IStatusDisplay } from "./interfaces/display.js";
import type { BeaconId, EpochSeconds } from "./types/branded.js";
import { nowSeconds, toBeaconId, toDeviceEui } from "./types/branded.js";
import type { BeaconSnapshot, Zone } from "./types/beacon.js";
import type { MonitorEventType } from "./types/events.js";
import type { WatchlistTable } from "./types/topology.js";

// ─── Configuration ──────────────────────────────────────────────────

export interface BeaconMonitorOptions {
  /** Parsed settings. Default: all defaults. */
  settings?: Settings;
  /** Downlink transport. Default: an in-memory dry-run transport. */
  transport?: IDownlinkTransport;
  /** Initial watchlist. When given, start() does not read the file. */
  watchlist?: WatchlistTable;
  display?: IStatusDisplay;
  hooks?: AlarmHooks;
  /** Delay function for the dispatcher. Tests pass an instant one. */
  sleep?: (ms: number) => Promise<void>;
  clock?: () => EpochSeconds;
  logger?: Logger;
}

// ─── Orchestrator ───────────────────────────────────────────────────

export class BeaconMonitor {
  readonly bus: AlarmEventBus;
  readonly watchlist: WatchlistStore;
  readonly builder: CommandBuilder;
  readonly dispatcher: CommandDispatcher;
  readonly machine: BeaconStateMachine;
  readonly watchdog: Watchdog;
  readonly settings: Settings;

  private readonly display: IStatusDisplay | null;
  private readonly clock: () => EpochSeconds;
  private readonly logger: Logger;
  private readonly hasInitialTable: boolean;
  private readonly hooks: AlarmHooks | null;
  private forwarder: ForwarderHandle | null = null;
  private refreshTimer: ReturnType<typeof setInterval> | null = null;
  private started = false;

  constructor(options: BeaconMonitorOptions = {}) {
    const settings = options.settings ?? defaultSettings();
    const clock = options.clock ?? nowSeconds;
    const logger = options.logger;

    this.settings = settings;
    this.clock = clock;
    this.logger = componentLogger(logger, "monitor");
    this.display = options.display ?? null;
    this.hooks = options.hooks ?? null;
    this.hasInitialTable = options.watchlist !== undefined;

    this.bus = new AlarmEventBus(logger);
    this.watchlist = new WatchlistStore(this.bus, {
      defaultAlarmDevice: toDeviceEui(settings.alarm.targetDevice),
      autoDiscover: settings.watchlist.autoDiscover,
      file: settings.watchlist.file,
      clock,
      logger,
      table: options.watchlist,
    });
    this.builder = new CommandBuilder({ beaconMajor: settings.alarm.beaconMajor });
    this.dispatcher = new CommandDispatcher(
      options.transport ?? new InMemoryDownlinkTransport(logger),
      this.builder,
      this.bus,
      {
        fPort: settings.alarm.fPort,
        commandDelaySeconds: settings.alarm.commandDelaySeconds,
        volumeLevel: settings.alarm.volumeLevel,
        durationUnits: settings.alarm.durationUnits,
        clock,
        logger,
        sleep: options.sleep,
      }
    );
    this.machine = new BeaconStateMachine(
      this.watchlist,
      this.dispatcher,
      this.bus,
      {
        safeRssiThreshold: settings.policy.safeRssiThreshold,
        rssiDirection: settings.policy.rssiDirection,
        debounceSeconds: settings.policy.debounceSeconds,
        topologyAware: settings.policy.topologyAware,
      },
      logger
    );
    this.watchdog = new Watchdog(this.machine, {
      maxSilenceSeconds: settings.policy.maxSilenceSeconds,
      intervalSeconds: settings.watchdog.intervalSeconds,
      clock,
      logger,
    });

    // Beacons taken off the watchlist stop updating, so the watchdog would
    // otherwise report them LOST
    this.bus.on("WATCHLIST_RELOADED", (event) => {
      this.machine.forgetUntracked((id) => this.watchlist.lookup(id) !== null, event.timestamp);
    });
  }

  // ─── Lifecycle ──────────────────────────────────────────────────

  /**
   * Load the watchlist file (unless a table was supplied), attach the
   * display and hooks, then start the watchdog and the display refresh
   * timer.
   */
  async start(): Promise<void> {
    if (this.started) return;

    if (!this.hasInitialTable) {
      const loaded = await this.watchlist.reloadFromFile();
      if (!loaded) {
        this.logger.warn("starting with an empty watchlist");
      }
    }

    this.forwarder = wire(this.bus, this.machine, {
      display: this.display ?? false,
      hooks: this.hooks ?? false,
    });
    this.watchdog.start();
    const refreshSeconds = this.settings.display.refreshSeconds;
    if (this.display && refreshSeconds > 0) {
      this.refreshTimer = setInterval(() => this.refreshDisplay(), refreshSeconds * 1000);
    }

    this.started = true;
    this.logger.info(
      {
        beacons: this.watchlist.getTable().beacons.size,
        threshold: this.settings.policy.safeRssiThreshold,
        debounceSeconds: this.settings.policy.debounceSeconds,
        topologyAware: this.settings.policy.topologyAware,
      },
      "monitor started"
    );
  }

  /**
   * Stop timers and detach the display and hooks. Queued downlinks still
   * drain; await {@link whenIdle} to wait for them.
   */
  stop(): void {
    this.watchdog.stop();
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = null;
    }
    this.forwarder?.teardown();
    this.forwarder = null;
    this.started = false;
    this.logger.info("monitor stopped");
  }

  // ─── Inbound ────────────────────────────────────────────────────

  /**
   * Process one sighting. Untracked beacons are ignored (UNKNOWN) and get
   * no state.
   */
  onObservation(
    beaconId: string,
    rssi: number,
    gatewayId: string | null,
    now: EpochSeconds = this.clock()
  ): Zone {
    const resolution = this.watchlist.resolve(beaconId);
    if (!resolution.tracked) {
      this.logger.debug({ beaconId: resolution.beaconId, rssi }, "ignoring untracked beacon");
      return "UNKNOWN";
    }
    return this.machine.evaluate({
      beaconId: resolution.beaconId,
      rssi,
      gatewayId: gatewayId === null ? null : toDeviceEui(gatewayId),
      observedAt: now,
    });
  }

  /**
   * Decode a raw ChirpStack uplink and process every sighting in it.
   * Undecodable messages are logged and yield no zones.
   */
  handleUplink(message: unknown, now: EpochSeconds = this.clock()): Zone[] {
    let report: UplinkReport;
    try {
      report = normalizeUplink(message, now);
    } catch (err) {
      if (err instanceof UplinkError) {
        this.logger.warn({ err, code: err.code }, "dropping undecodable uplink");
        return [];
      }
      throw err;
    }
    return this.handleReport(report);
  }

  /**
   * Process an already-normalized uplink (as delivered by the MQTT bridge).
   */
  handleReport(report: UplinkReport): Zone[] {
    return report.observations.map((o) =>
      this.onObservation(o.beaconId, o.rssi, o.gatewayId, o.observedAt)
    );
  }

  watchdogTick(now: EpochSeconds = this.clock()): BeaconId[] {
    return this.watchdog.sweep(now);
  }

  // ─── Operator Controls ──────────────────────────────────────────

  async reloadWatchlist(): Promise<boolean> {
    return this.watchlist.reloadFromFile();
  }

  triggerAlarm(beaconId: string, now: EpochSeconds = this.clock()): void {
    this.machine.triggerManually(this.canonicalId(beaconId), now);
  }

  silenceAlarm(beaconId?: string, now: EpochSeconds = this.clock()): void {
    this.machine.silenceManually(
      beaconId === undefined ? null : this.canonicalId(beaconId),
      now
    );
  }

  /** Redraw every known beacon on the display. */
  refreshDisplay(): void {
    if (!this.display) return;
    for (const snapshot of this.machine.getAllSnapshots().values()) {
      this.display.render(snapshot);
    }
  }

  // ─── Queries ────────────────────────────────────────────────────

  getStateSnapshot(): ReadonlyMap<BeaconId, BeaconSnapshot> {
    return this.machine.getAllSnapshots();
  }

  /**
   * Listen for monitor events.
   * @returns Unsubscribe function.
   */
  subscribe<T extends MonitorEventType>(type: T, handler: EventListener<T>): () => void {
    this.bus.on(type, handler);
    return () => this.bus.off(type, handler);
  }

  /** Resolves once every queued downlink has been sent or has failed. */
  whenIdle(): Promise<void> {
    return this.dispatcher.whenIdle();
  }

  /** Map an operator-supplied id onto the tracked id when one matches. */
  private canonicalId(raw: string): BeaconId {
    return this.watchlist.lookup(raw)?.beaconId ?? toBeaconId(raw);
  }
}
