/**
 * @module forwarder
 * @description Wires monitor events to a status display and to
 * site-specific alarm hooks.
 *
 * Without the forwarder, every consumer writes this:
 *   bus.on("BEACON_STATE_CHANGED", e => display.render(machine.getSnapshot(e.beaconId)));
 *   bus.on("ALARM_TRIGGERED", e => hooks.onAlarm(e));
 *   // ... one line per event
 *
 * With the forwarder:
 *   const handle = wire(bus, machine, { display, hooks: loggingHooks(logger) });
 *   // later
 *   handle.teardown();
 */

import type { IEventBus, EventListener } from "./interfaces/event-bus.js";
import type { IStatusDisplay } from "./interfaces/display.js";
import type { BeaconId } from "./types/branded.js";
import type { BeaconSnapshot } from "./types/beacon.js";
import type {
  AlarmSilencedEvent,
  AlarmTriggeredEvent,
  BeaconDiscoveredEvent,
  BeaconLostEvent,
  BeaconStateChangedEvent,
  MonitorEventType,
} from "./types/events.js";
import { componentLogger } from "./config/logger.js";
import type { Logger } from "./config/logger.js";

// ─── Types ──────────────────────────────────────────────────────────

/**
 * Where the forwarder reads beacon state from. The state machine
 * satisfies this.
 */
export interface SnapshotSource {
  getSnapshot(beaconId: BeaconId): BeaconSnapshot | null;
}

/**
 * Custom actions run on alarm activity (notify staff, switch a light, …).
 * A throwing hook is logged by the event bus and does not affect others.
 */
export interface AlarmHooks {
  onStateChange?(event: BeaconStateChangedEvent): void;
  onAlarm?(event: AlarmTriggeredEvent): void;
  onSilenced?(event: AlarmSilencedEvent): void;
  onLost?(event: BeaconLostEvent): void;
  onDiscovered?(event: BeaconDiscoveredEvent): void;
}

/**
 * Events after which a beacon's display line is redrawn.
 */
const DISPLAY_EVENTS = [
  "BEACON_INITIALIZED",
  "BEACON_STATE_CHANGED",
  "BEACON_LOST",
  "ALARM_TRIGGERED",
  "ALARM_SILENCED",
] as const;

export interface ForwarderConfig {
  /** Display to redraw, or false to skip */
  display?: IStatusDisplay | false;
  /** Hooks to call, or false to skip */
  hooks?: AlarmHooks | false;
}

/**
 * Active forwarding handles, used for cleanup.
 */
export interface ForwarderHandle {
  /** Event types with a forwarder listener, one entry per listener */
  readonly events: readonly MonitorEventType[];
  /** Tear down all forwarding */
  teardown(): void;
  readonly display: IStatusDisplay | null;
  readonly hooks: AlarmHooks | null;
}

// ─── Forwarder ──────────────────────────────────────────────────────

/**
 * Wire an event bus to a display and/or hooks.
 *
 * @param bus - The monitor's event bus
 * @param source - Snapshot lookup for display redraws
 * @param config - Which consumers to wire
 * @returns A handle with teardown() for cleanup
 */
export function wire(
  bus: IEventBus,
  source: SnapshotSource,
  config: ForwarderConfig = {}
): ForwarderHandle {
  const display = config.display === false ? null : config.display ?? null;
  const hooks = config.hooks === false ? null : config.hooks ?? null;

  const events: MonitorEventType[] = [];
  const removers: Array<() => void> = [];

  function listen<T extends MonitorEventType>(type: T, listener: EventListener<T>): void {
    bus.on(type, listener);
    events.push(type);
    removers.push(() => bus.off(type, listener));
  }

  if (display) {
    for (const type of DISPLAY_EVENTS) {
      listen(type, (event) => {
        // ALARM_SILENCED for "all devices" carries no beacon
        if (event.beaconId === null) return;
        const snapshot = source.getSnapshot(event.beaconId);
        if (snapshot) display.render(snapshot);
      });
    }
  }

  if (hooks) {
    const { onStateChange, onAlarm, onSilenced, onLost, onDiscovered } = hooks;
    if (onStateChange) listen("BEACON_STATE_CHANGED", (e) => onStateChange.call(hooks, e));
    if (onAlarm) listen("ALARM_TRIGGERED", (e) => onAlarm.call(hooks, e));
    if (onSilenced) listen("ALARM_SILENCED", (e) => onSilenced.call(hooks, e));
    if (onLost) listen("BEACON_LOST", (e) => onLost.call(hooks, e));
    if (onDiscovered) listen("BEACON_DISCOVERED", (e) => onDiscovered.call(hooks, e));
  }

  return {
    events,
    display,
    hooks,
    teardown() {
      for (const remove of removers) remove();
      removers.length = 0;
      events.length = 0;
    },
  };
}

// ─── Default Hooks ──────────────────────────────────────────────────

/**
 * Hooks that only log. Sites replace these with their own actions.
 */
export function loggingHooks(logger?: Logger): AlarmHooks {
  const log = componentLogger(logger, "hooks");
  return {
    onStateChange(e) {
      log.info(
        { beaconId: e.beaconId, from: e.previousZone, to: e.currentZone, rssi: e.rssi },
        "custom action: state change"
      );
    },
    onAlarm(e) {
      log.warn(
        { beaconId: e.beaconId, target: e.targetDevice, cause: e.cause },
        "custom action: alarm"
      );
    },
    onSilenced(e) {
      log.info({ beaconId: e.beaconId, target: e.targetDevice }, "custom action: silenced");
    },
    onLost(e) {
      log.warn(
        { beaconId: e.beaconId, silentForSeconds: e.silentForSeconds },
        "custom action: lost"
      );
    },
  };
}
