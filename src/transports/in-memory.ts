/**
 * @module transports/in-memory
 * @description In-process downlink transport.
 *
 * Records sends instead of publishing them. Used for dry runs (with a
 * logger, each downlink is printed as it would have been published) and as
 * the transport stand-in in tests, where {@link InMemoryDownlinkTransport.failWith}
 * injects transport errors. Only the latest `historyLimit` sends are kept.
 */

import { DownlinkError } from "../interfaces/downlink.js";
import type { IDownlinkTransport } from "../interfaces/downlink.js";
import type { DeviceEui } from "../types/branded.js";
import { toHex } from "../codec/commands.js";
import { componentLogger } from "../config/logger.js";
import type { Logger } from "../config/logger.js";

export interface RecordedDownlink {
  readonly target: DeviceEui;
  readonly payloadHex: string;
  readonly port: number;
}

export interface InMemoryTransportOptions {
  /** Sends kept for inspection, oldest dropped first. 0 keeps none. Default: 1000 */
  historyLimit?: number;
}

export class InMemoryDownlinkTransport implements IDownlinkTransport {
  private readonly recorded: RecordedDownlink[] = [];
  private failure: DownlinkError | null = null;
  private failuresLeft = 0;
  private readonly historyLimit: number;
  private readonly logger: Logger;

  constructor(logger?: Logger, options: InMemoryTransportOptions = {}) {
    this.logger = componentLogger(logger, "dry-run");
    this.historyLimit = Math.max(0, options.historyLimit ?? 1000);
  }

  async send(target: DeviceEui, payload: Uint8Array, port: number): Promise<void> {
    if (this.failure && this.failuresLeft > 0) {
      this.failuresLeft--;
      throw this.failure;
    }
    const entry = { target, payloadHex: toHex(payload), port };
    this.logger.info(entry, "downlink (not published)");
    if (this.historyLimit === 0) return;
    this.recorded.push(entry);
    if (this.recorded.length > this.historyLimit) {
      this.recorded.splice(0, this.recorded.length - this.historyLimit);
    }
  }

  /**
   * Make the next `times` sends reject with a DownlinkError.
   */
  failWith(code: DownlinkError["code"], times = 1): void {
    this.failure = new DownlinkError(`injected ${code}`, code);
    this.failuresLeft = times;
  }

  /** Retained sends, oldest first. */
  get sent(): readonly RecordedDownlink[] {
    return this.recorded;
  }

  /** Sent payloads as hex, optionally for one device only. */
  payloads(target?: DeviceEui): string[] {
    return this.recorded
      .filter((r) => target === undefined || r.target === target)
      .map((r) => r.payloadHex);
  }

  clear(): void {
    this.recorded.length = 0;
  }
}
