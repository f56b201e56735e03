/**
 * @module primitives/command-dispatcher
 * @description Per-device downlink queues.
 *
 * Each alarm device gets its own promise chain. A job that lands behind a
 * busy chain first waits `commandDelaySeconds`, the same gap the trigger
 * sequence leaves between its own steps, so the device never receives two
 * frames back to back. Evaluation never waits on any of this.
 *
 * Trigger sequence:
 *   SET_VOLUME(level) → delay → SET_DURATION(units) → delay → SEARCH_BEACON(minor)
 *
 * A failed step is logged and published; the remaining steps still run.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { IAlarmDispatcher } from "../interfaces/dispatcher.js";
import type { IDownlinkTransport } from "../interfaces/downlink.js";
import type { IEventBus } from "../interfaces/event-bus.js";
import type { BeaconId, DeviceEui, EpochSeconds } from "../types/branded.js";
import { nowSeconds } from "../types/branded.js";
import type { DownlinkCommand } from "../types/command.js";
import { CommandBuilder, VOLUME_LOUDEST, toHex } from "../codec/commands.js";
import { componentLogger } from "../config/logger.js";
import type { Logger } from "../config/logger.js";

// ─── Configuration ──────────────────────────────────────────────────

export interface CommandDispatcherConfig {
  /** LoRaWAN FPort for configuration frames. Default: 10 */
  fPort?: number;
  /** Gap between consecutive frames to one device. Default: 2 */
  commandDelaySeconds?: number;
  /** Buzzer volume for the trigger sequence. Default: 4 (loudest) */
  volumeLevel?: number;
  /** Buzzer duration in 10 s units. Default: 6 (one minute) */
  durationUnits?: number;
  /** Injected for tests. */
  sleep?: (ms: number) => Promise<void>;
  clock?: () => EpochSeconds;
  logger?: Logger;
}

const DEFAULTS = {
  fPort: 10,
  commandDelaySeconds: 2,
  volumeLevel: VOLUME_LOUDEST,
  durationUnits: 6,
};

const defaultSleep = (ms: number): Promise<void> => delay(ms).then(() => undefined);

// ─── Dispatcher ─────────────────────────────────────────────────────

export class CommandDispatcher implements IAlarmDispatcher {
  private readonly config: Required<
    Pick<CommandDispatcherConfig, "fPort" | "commandDelaySeconds" | "volumeLevel" | "durationUnits">
  >;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => EpochSeconds;
  private readonly logger: Logger;

  /** Tail of each device's chain. */
  private readonly queues = new Map<DeviceEui, Promise<void>>();
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly transport: IDownlinkTransport,
    private readonly builder: CommandBuilder,
    private readonly bus: IEventBus,
    config: CommandDispatcherConfig = {}
  ) {
    this.config = {
      fPort: config.fPort ?? DEFAULTS.fPort,
      commandDelaySeconds: config.commandDelaySeconds ?? DEFAULTS.commandDelaySeconds,
      volumeLevel: config.volumeLevel ?? DEFAULTS.volumeLevel,
      durationUnits: config.durationUnits ?? DEFAULTS.durationUnits,
    };
    this.sleep = config.sleep ?? defaultSleep;
    this.clock = config.clock ?? nowSeconds;
    this.logger = componentLogger(config.logger, "dispatcher");
  }

  // ─── Commands ───────────────────────────────────────────────────

  sendStop(target: DeviceEui): void {
    this.enqueue(target, [{ kind: "MUTE" }]);
  }

  runTriggerSequence(target: DeviceEui, beaconId: BeaconId): void {
    this.enqueue(target, [
      { kind: "SET_VOLUME", level: this.config.volumeLevel },
      { kind: "SET_DURATION", units: this.config.durationUnits },
      { kind: "SEARCH_BEACON", beaconId },
    ]);
  }

  async whenIdle(): Promise<void> {
    // Jobs may enqueue while we wait (listeners reacting to DOWNLINK_*)
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  /** Number of devices with queued or running jobs. */
  get busyDevices(): number {
    return this.queues.size;
  }

  // ─── Internals ──────────────────────────────────────────────────

  private enqueue(target: DeviceEui, commands: readonly DownlinkCommand[]): void {
    const previous = this.queues.get(target);

    const job = (previous ?? Promise.resolve())
      .then(async () => {
        if (previous) await this.pause();
        await this.runSteps(target, commands);
      })
      .catch((err: unknown) => {
        this.logger.error({ err, target }, "downlink job aborted");
      });

    const tail: Promise<void> = job.then(() => {
      this.pending.delete(tail);
      if (this.queues.get(target) === tail) {
        this.queues.delete(target);
      }
    });

    this.queues.set(target, tail);
    this.pending.add(tail);
  }

  private async runSteps(target: DeviceEui, commands: readonly DownlinkCommand[]): Promise<void> {
    for (const [i, command] of commands.entries()) {
      if (i > 0) await this.pause();
      await this.sendOne(target, command);
    }
  }

  private pause(): Promise<void> {
    return this.sleep(this.config.commandDelaySeconds * 1000);
  }

  /** Send one frame. Failures are logged and published, never thrown. */
  private async sendOne(target: DeviceEui, command: DownlinkCommand): Promise<void> {
    const port = this.config.fPort;
    try {
      // Built at send time so search sequence numbers follow delivery order
      const payload = this.builder.build(command);
      await this.transport.send(target, payload, port);

      const payloadHex = toHex(payload);
      this.logger.debug({ target, command: command.kind, payloadHex, port }, "downlink sent");
      this.bus.emit({
        type: "DOWNLINK_SENT",
        targetDevice: target,
        command: command.kind,
        payloadHex,
        port,
        timestamp: this.clock(),
      });
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      this.logger.error({ err, target, command: command.kind }, "downlink failed");
      this.bus.emit({
        type: "DOWNLINK_FAILED",
        targetDevice: target,
        command: command.kind,
        error,
        timestamp: this.clock(),
      });
    }
  }
}
