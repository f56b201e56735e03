/**
 * @module display
 * @description Log-backed status display. One line per beacon, written
 * through pino, in place of the operator window.
 */

import type { IStatusDisplay } from "./interfaces/display.js";
import type { BeaconSnapshot } from "./types/beacon.js";
import type { EpochSeconds } from "./types/branded.js";
import { nowSeconds } from "./types/branded.js";
import { componentLogger } from "./config/logger.js";
import type { Logger } from "./config/logger.js";

/**
 * `Resident A [64AF] | ALARM | -85 dBm | seen 3s ago | WEAK_SIGNAL | ALARM ACTIVE`
 */
export function formatStatusLine(snapshot: BeaconSnapshot, now: EpochSeconds): string {
  const rssi = snapshot.lastRssi === null ? "n/a" : `${snapshot.lastRssi} dBm`;
  const seen =
    snapshot.lastSeen === null
      ? "never"
      : `${Math.max(0, Math.round(now - snapshot.lastSeen))}s ago`;

  const parts = [
    `${snapshot.displayName} [${snapshot.beaconId}]`,
    snapshot.zone,
    rssi,
    `seen ${seen}`,
  ];
  if (snapshot.unsafeReason !== null) parts.push(snapshot.unsafeReason);
  if (snapshot.alarmActive) parts.push("ALARM ACTIVE");
  return parts.join(" | ");
}

export class LogStatusDisplay implements IStatusDisplay {
  private readonly logger: Logger;

  constructor(
    logger?: Logger,
    private readonly clock: () => EpochSeconds = nowSeconds
  ) {
    this.logger = componentLogger(logger, "display");
  }

  render(snapshot: BeaconSnapshot): void {
    const line = formatStatusLine(snapshot, this.clock());
    if (snapshot.alarmActive || snapshot.zone === "LOST") {
      this.logger.warn({ beaconId: snapshot.beaconId, zone: snapshot.zone }, line);
    } else {
      this.logger.info({ beaconId: snapshot.beaconId, zone: snapshot.zone }, line);
    }
  }
}
