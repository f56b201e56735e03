/**
 * @module primitives/beacon-state-machine
 * @description Per-beacon debounced safe-zone state machine.
 *
 * ```
 *   UNKNOWN ──first obs──▶ SAFE ◀──safe obs── WEAK / ALARM / LOST
 *                           │
 *                     unsafe obs
 *                           ▼
 *                         WEAK ──unsafe for ≥ debounce──▶ ALARM
 *
 *   any seen state ──silent > maxSilence (watchdog)──▶ LOST
 * ```
 *
 * Invariants:
 * - alarmActive ⇒ zone ∈ {ALARM, LOST}
 * - weakSince ≠ null ⇔ zone ∈ {WEAK, ALARM, LOST}
 * - at most one trigger sequence per rising edge of alarmActive
 */

import type { IBeaconStateMachine } from "../interfaces/state-machine.js";
import type { IWatchlistStore } from "../interfaces/watchlist.js";
import type { IAlarmDispatcher } from "../interfaces/dispatcher.js";
import type { IEventBus } from "../interfaces/event-bus.js";
import type { BeaconId, DeviceEui, EpochSeconds, ZoneId } from "../types/branded.js";
import type {
  BeaconObservation,
  BeaconSnapshot,
  BeaconState,
  SafetyAssessment,
  SafetyPolicy,
  UnsafeReason,
  Zone,
} from "../types/beacon.js";
import type { AlarmCause } from "../types/command.js";
import { componentLogger } from "../config/logger.js";
import type { Logger } from "../config/logger.js";

export const DEFAULT_POLICY: SafetyPolicy = {
  safeRssiThreshold: -70,
  rssiDirection: "HIGHER_IS_SAFER",
  debounceSeconds: 5,
  topologyAware: false,
};

// ─── Policy ─────────────────────────────────────────────────────────

/**
 * Check one reading against the policy. Wrong zone takes precedence over
 * weak signal when both apply.
 */
export function assessSafety(
  rssi: number,
  detectedZoneId: ZoneId | null,
  homeZoneId: ZoneId | null,
  policy: SafetyPolicy
): SafetyAssessment {
  const signalSafe =
    policy.rssiDirection === "HIGHER_IS_SAFER"
      ? rssi >= policy.safeRssiThreshold
      : rssi <= policy.safeRssiThreshold;

  // An unknown gateway fails the zone check; a beacon without a home zone
  // is only held to the signal check
  const zoneSafe =
    !policy.topologyAware ||
    (detectedZoneId !== null && (homeZoneId === null || detectedZoneId === homeZoneId));

  let reason: UnsafeReason | null = null;
  if (!zoneSafe) reason = "WRONG_ZONE";
  else if (!signalSafe) reason = "WEAK_SIGNAL";

  return { safe: reason === null, reason, detectedZoneId, homeZoneId };
}

// ─── State Machine ──────────────────────────────────────────────────

export class BeaconStateMachine implements IBeaconStateMachine {
  private readonly states = new Map<BeaconId, BeaconState>();
  private readonly policy: SafetyPolicy;
  private readonly logger: Logger;

  constructor(
    private readonly watchlist: IWatchlistStore,
    private readonly dispatcher: IAlarmDispatcher,
    private readonly bus: IEventBus,
    policy: Partial<SafetyPolicy> = {},
    logger?: Logger
  ) {
    this.policy = { ...DEFAULT_POLICY, ...policy };
    this.logger = componentLogger(logger, "state-machine");
  }

  // ─── Commands ───────────────────────────────────────────────────

  evaluate(observation: BeaconObservation): Zone {
    const { beaconId, rssi, gatewayId, observedAt: now } = observation;
    const state = this.getOrCreate(beaconId);

    state.displayName = this.watchlist.displayNameOf(beaconId);
    state.homeZoneId = this.watchlist.homeZoneOf(beaconId);
    state.detectedZoneId = this.watchlist.zoneOf(gatewayId);
    state.lastRssi = rssi;
    state.lastSeen = now;

    const assessment = assessSafety(rssi, state.detectedZoneId, state.homeZoneId, this.policy);
    this.logger.debug(
      { beaconId, rssi, gatewayId, safe: assessment.safe, reason: assessment.reason },
      "observation"
    );

    if (!state.initialized) {
      return this.initialize(state, now);
    }
    if (assessment.safe) {
      return this.onSafe(state, now);
    }
    return this.onUnsafe(state, assessment.reason ?? "WEAK_SIGNAL", now);
  }

  markLost(beaconId: BeaconId, now: EpochSeconds): boolean {
    const state = this.states.get(beaconId);
    if (!state || state.lastSeen === null || state.zone === "LOST") {
      return false;
    }

    const silentForSeconds = Math.max(0, now - state.lastSeen);
    state.weakSince ??= now;
    this.transition(state, "LOST", null, now);
    this.logger.warn({ beaconId, silentForSeconds }, "beacon lost");
    this.bus.emit({ type: "BEACON_LOST", beaconId, silentForSeconds, timestamp: now });

    if (!state.alarmActive) {
      this.raise(state, "SIGNAL_LOST", now);
    }
    return true;
  }

  triggerManually(beaconId: BeaconId, now: EpochSeconds): void {
    const state = this.states.get(beaconId);
    if (!state) {
      // Not seen yet: buzz its home zone without creating state
      const target = this.watchlist.alarmDeviceFor(this.watchlist.homeZoneOf(beaconId));
      this.logger.warn({ beaconId, target }, "manual alarm for unseen beacon");
      this.dispatcher.runTriggerSequence(target, beaconId);
      this.bus.emit({
        type: "ALARM_TRIGGERED",
        beaconId,
        targetDevice: target,
        cause: "MANUAL",
        timestamp: now,
      });
      return;
    }

    state.weakSince ??= now;
    if (state.zone !== "LOST") {
      this.transition(state, "ALARM", state.unsafeReason, now);
    }
    this.raise(state, "MANUAL", now);
  }

  silenceManually(beaconId: BeaconId | null, now: EpochSeconds): void {
    if (beaconId !== null) {
      const state = this.states.get(beaconId);
      const target =
        state?.targetDevice ?? this.watchlist.alarmDeviceFor(this.watchlist.homeZoneOf(beaconId));
      if (state) this.release(state, now);
      this.dispatcher.sendStop(target);
      this.logger.warn({ beaconId, target }, "alarm silenced by operator");
      this.bus.emit({ type: "ALARM_SILENCED", beaconId, targetDevice: target, timestamp: now });
      return;
    }

    const targets = new Set<DeviceEui>([this.watchlist.alarmDeviceFor(null)]);
    for (const state of this.states.values()) {
      if (!state.alarmActive) continue;
      if (state.targetDevice !== null) targets.add(state.targetDevice);
      this.release(state, now);
    }
    for (const target of targets) {
      this.dispatcher.sendStop(target);
      this.logger.warn({ target }, "alarm silenced by operator");
      this.bus.emit({ type: "ALARM_SILENCED", beaconId: null, targetDevice: target, timestamp: now });
    }
  }

  forgetUntracked(isTracked: (beaconId: BeaconId) => boolean, now: EpochSeconds): BeaconId[] {
    const dropped: BeaconId[] = [];
    for (const state of [...this.states.values()]) {
      if (isTracked(state.beaconId)) continue;
      this.states.delete(state.beaconId);
      dropped.push(state.beaconId);

      if (state.alarmActive) {
        const target = state.targetDevice ?? this.targetFor(state);
        this.dispatcher.sendStop(target);
        this.logger.warn({ beaconId: state.beaconId, target }, "alarm silenced for untracked beacon");
        this.bus.emit({
          type: "ALARM_SILENCED",
          beaconId: state.beaconId,
          targetDevice: target,
          timestamp: now,
        });
      }
      this.logger.info({ beaconId: state.beaconId, zone: state.zone }, "beacon no longer tracked");
    }
    return dropped;
  }

  // ─── Queries ────────────────────────────────────────────────────

  findSilent(now: EpochSeconds, maxSilenceSeconds: number): BeaconId[] {
    const silent: BeaconId[] = [];
    for (const state of this.states.values()) {
      if (
        state.lastSeen !== null &&
        state.zone !== "LOST" &&
        now - state.lastSeen > maxSilenceSeconds
      ) {
        silent.push(state.beaconId);
      }
    }
    return silent;
  }

  getSnapshot(beaconId: BeaconId): BeaconSnapshot | null {
    const state = this.states.get(beaconId);
    return state ? Object.freeze({ ...state }) : null;
  }

  getAllSnapshots(): ReadonlyMap<BeaconId, BeaconSnapshot> {
    const out = new Map<BeaconId, BeaconSnapshot>();
    for (const [id, state] of this.states) {
      out.set(id, Object.freeze({ ...state }));
    }
    return out;
  }

  // ─── Internals ──────────────────────────────────────────────────

  private getOrCreate(beaconId: BeaconId): BeaconState {
    let state = this.states.get(beaconId);
    if (!state) {
      state = {
        beaconId,
        displayName: this.watchlist.displayNameOf(beaconId),
        zone: "UNKNOWN",
        lastRssi: null,
        lastSeen: null,
        weakSince: null,
        alarmActive: false,
        initialized: false,
        homeZoneId: null,
        detectedZoneId: null,
        unsafeReason: null,
        targetDevice: null,
      };
      this.states.set(beaconId, state);
    }
    return state;
  }

  /** First observation: whatever the reading, start SAFE and silence the device. */
  private initialize(state: BeaconState, now: EpochSeconds): Zone {
    const target = this.targetFor(state);
    state.targetDevice = target;
    state.zone = "SAFE";
    state.weakSince = null;
    state.alarmActive = false;
    state.unsafeReason = null;
    state.initialized = true;

    this.dispatcher.sendStop(target);
    this.logger.info(
      { beaconId: state.beaconId, name: state.displayName, rssi: state.lastRssi },
      "beacon initialized"
    );
    this.bus.emit({
      type: "BEACON_INITIALIZED",
      beaconId: state.beaconId,
      displayName: state.displayName,
      rssi: state.lastRssi ?? 0,
      timestamp: now,
    });
    return "SAFE";
  }

  private onSafe(state: BeaconState, now: EpochSeconds): Zone {
    state.weakSince = null;
    state.unsafeReason = null;

    if (state.alarmActive) {
      const target = state.targetDevice ?? this.targetFor(state);
      state.alarmActive = false;
      this.dispatcher.sendStop(target);
      this.logger.warn({ beaconId: state.beaconId, target }, "alarm silenced");
      this.bus.emit({
        type: "ALARM_SILENCED",
        beaconId: state.beaconId,
        targetDevice: target,
        timestamp: now,
      });
    }

    this.transition(state, "SAFE", null, now);
    return "SAFE";
  }

  private onUnsafe(state: BeaconState, reason: UnsafeReason, now: EpochSeconds): Zone {
    state.unsafeReason = reason;

    if (state.alarmActive) {
      // Latched (e.g. after LOST): report ALARM, never resend
      this.transition(state, "ALARM", reason, now);
      return "ALARM";
    }

    if (state.weakSince === null) {
      state.weakSince = now;
      this.transition(state, "WEAK", reason, now);
      return "WEAK";
    }

    const duration = Math.max(0, now - state.weakSince);
    if (duration < this.policy.debounceSeconds) {
      this.transition(state, "WEAK", reason, now);
      return "WEAK";
    }

    state.targetDevice = this.targetFor(state);
    this.transition(state, "ALARM", reason, now);
    this.raise(state, "DEBOUNCE_ELAPSED", now);
    return "ALARM";
  }

  /** Latch the alarm and queue the trigger sequence. */
  private raise(state: BeaconState, cause: AlarmCause, now: EpochSeconds): void {
    const target = state.targetDevice ?? this.targetFor(state);
    state.targetDevice = target;
    state.alarmActive = true;

    this.dispatcher.runTriggerSequence(target, state.beaconId);
    this.logger.warn(
      { beaconId: state.beaconId, name: state.displayName, target, cause },
      "alarm triggered"
    );
    this.bus.emit({
      type: "ALARM_TRIGGERED",
      beaconId: state.beaconId,
      targetDevice: target,
      cause,
      timestamp: now,
    });
  }

  /** Clear the latch; a confirmed alarm drops back to a fresh debounce window. */
  private release(state: BeaconState, now: EpochSeconds): void {
    const wasActive = state.alarmActive;
    state.alarmActive = false;
    if (wasActive && state.weakSince !== null) state.weakSince = now;
    if (state.zone === "ALARM") {
      this.transition(state, "WEAK", state.unsafeReason, now);
    }
  }

  private transition(
    state: BeaconState,
    next: Zone,
    reason: UnsafeReason | null,
    now: EpochSeconds
  ): void {
    const previous = state.zone;
    if (previous === next) return;
    state.zone = next;

    this.logger.info(
      { beaconId: state.beaconId, name: state.displayName, from: previous, to: next, rssi: state.lastRssi, reason },
      "state changed"
    );
    this.bus.emit({
      type: "BEACON_STATE_CHANGED",
      beaconId: state.beaconId,
      previousZone: previous,
      currentZone: next,
      rssi: state.lastRssi,
      reason,
      timestamp: now,
    });
  }

  /** Alarm device nearest the beacon: detected zone, then home zone, then default. */
  private targetFor(state: BeaconState): DeviceEui {
    return this.watchlist.alarmDeviceFor(state.detectedZoneId ?? state.homeZoneId);
  }
}
