/**
 * @module primitives/watchdog
 * @description Periodic silence sweep. A beacon that has been seen at least
 * once and then stays silent longer than `maxSilenceSeconds` is moved to
 * LOST, which raises its alarm unless one is already latched.
 */

import type { IBeaconStateMachine } from "../interfaces/state-machine.js";
import type { BeaconId, EpochSeconds } from "../types/branded.js";
import { nowSeconds } from "../types/branded.js";
import { componentLogger } from "../config/logger.js";
import type { Logger } from "../config/logger.js";

export interface WatchdogConfig {
  /** Silence tolerated before a beacon is LOST. Default: 120 */
  maxSilenceSeconds?: number;
  /** Sweep period. Default: 5 */
  intervalSeconds?: number;
  clock?: () => EpochSeconds;
  logger?: Logger;
}

export class Watchdog {
  private readonly maxSilenceSeconds: number;
  private readonly intervalSeconds: number;
  private readonly clock: () => EpochSeconds;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly machine: IBeaconStateMachine,
    config: WatchdogConfig = {}
  ) {
    this.maxSilenceSeconds = config.maxSilenceSeconds ?? 120;
    this.intervalSeconds = config.intervalSeconds ?? 5;
    this.clock = config.clock ?? nowSeconds;
    this.logger = componentLogger(config.logger, "watchdog");
  }

  /**
   * Mark every overdue beacon LOST.
   * @returns The beacons that transitioned during this sweep.
   */
  sweep(now: EpochSeconds): BeaconId[] {
    const lost = this.machine
      .findSilent(now, this.maxSilenceSeconds)
      .filter((beaconId) => this.machine.markLost(beaconId, now));
    if (lost.length > 0) {
      this.logger.debug({ lost }, "sweep marked beacons lost");
    }
    return lost;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sweep(this.clock());
    }, this.intervalSeconds * 1000);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }
}
