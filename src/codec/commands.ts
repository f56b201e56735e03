/**
 * @module codec/commands
 * @description Downlink command codec for Lansitec macro sensors.
 *
 * Frame layouts (FPort 10, management/configuration):
 * - 0xB0: Alarm configuration, `B0 <msgId=00> <param> <value>`
 *   - param 0x01: buzzer volume (0 = mute, 4 = loudest)
 *   - param 0x02: buzzer duration in 10 s units
 * - 0xAC: Search beacon, `AC <seq> [<major:2>] <minor:2>`
 *
 * The search frame carries a rolling sequence byte: the device ignores a
 * search identical to the previous one, so each trigger must differ.
 */

import type { DownlinkCommand } from "../types/command.js";
import type { BeaconId } from "../types/branded.js";

// ─── Frame Constants ────────────────────────────────────────────────

export const FRAME_ALARM_CONFIG = 0xb0;
export const FRAME_SEARCH_BEACON = 0xac;

const PARAM_VOLUME = 0x01;
const PARAM_DURATION = 0x02;

export const VOLUME_MUTE = 0;
export const VOLUME_UNMUTE = 1;
export const VOLUME_LOUDEST = 4;

/**
 * Errors raised while building a command frame.
 */
export class CommandError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "INVALID_BEACON_ID"
      | "VALUE_OUT_OF_RANGE"
      | "UNKNOWN_COMMAND"
  ) {
    super(message);
    this.name = "CommandError";
  }
}

// ─── Builder ────────────────────────────────────────────────────────

export interface CommandBuilderOptions {
  /** Optional 2-byte beacon major (4 hex digits) inserted before the minor. */
  beaconMajor?: string;
  /** First sequence value handed out. Default: 0. */
  initialSequence?: number;
}

/**
 * CommandBuilder: maps logical commands to device bytes and owns the
 * process-wide search sequence counter.
 *
 * @example
 * ```ts
 * const builder = new CommandBuilder();
 * toHex(builder.build({ kind: "MUTE" })); // "B0000100"
 * toHex(builder.build({ kind: "SEARCH_BEACON", beaconId: toBeaconId("64AF") })); // "AC0064AF"
 * toHex(builder.build({ kind: "SEARCH_BEACON", beaconId: toBeaconId("64AF") })); // "AC0164AF"
 * ```
 */
export class CommandBuilder {
  private sequence: number;
  private readonly major: Uint8Array | null;

  constructor(options: CommandBuilderOptions = {}) {
    this.sequence = (options.initialSequence ?? 0) & 0xff;
    this.major =
      options.beaconMajor === undefined ? null : parseMajor(options.beaconMajor);
  }

  /**
   * Build the frame for a command. Only SEARCH_BEACON advances the
   * sequence, and only when the frame is valid.
   *
   * @throws {CommandError} for non-hex beacon ids or out-of-range values.
   */
  build(command: DownlinkCommand): Uint8Array {
    switch (command.kind) {
      case "MUTE":
        return alarmConfig(PARAM_VOLUME, VOLUME_MUTE);
      case "UNMUTE":
        return alarmConfig(PARAM_VOLUME, VOLUME_UNMUTE);
      case "SET_VOLUME":
        return alarmConfig(
          PARAM_VOLUME,
          checkRange("volume level", command.level, VOLUME_MUTE, VOLUME_LOUDEST)
        );
      case "SET_DURATION":
        return alarmConfig(
          PARAM_DURATION,
          checkRange("duration units", command.units, 0, 0xff)
        );
      case "SEARCH_BEACON":
        return this.buildSearch(command.beaconId);
      default:
        return unknownCommand(command);
    }
  }

  /**
   * The sequence value the next search frame will carry.
   */
  peekSequence(): number {
    return this.sequence;
  }

  private buildSearch(beaconId: BeaconId): Uint8Array {
    const minor = minorBytesOf(beaconId);
    const seq = this.sequence;
    // Wraps silently; duplicates after 256 searches are accepted
    this.sequence = (seq + 1) & 0xff;

    const major = this.major ?? new Uint8Array(0);
    const frame = new Uint8Array(2 + major.length + minor.length);
    frame[0] = FRAME_SEARCH_BEACON;
    frame[1] = seq;
    frame.set(major, 2);
    frame.set(minor, 2 + major.length);
    return frame;
  }
}

// ─── Helpers ────────────────────────────────────────────────────────

/**
 * Minor id of a beacon: its last four hex digits, left-padded with "0".
 * Gateways report `major || minor` (e.g. "001064AF" → "64AF").
 */
export function minorIdOf(beaconId: string): string {
  const upper = beaconId.trim().toUpperCase();
  return (upper.length > 4 ? upper.slice(-4) : upper).padStart(4, "0");
}

/**
 * Upper-case hex rendering of a frame, as the device documentation
 * writes commands.
 */
export function toHex(bytes: Uint8Array): string {
  let out = "";
  for (const byte of bytes) {
    out += byte.toString(16).padStart(2, "0");
  }
  return out.toUpperCase();
}

/**
 * Parse an even-length hex string into bytes.
 * @throws {CommandError} code=VALUE_OUT_OF_RANGE for malformed input.
 */
export function fromHex(hex: string): Uint8Array {
  const clean = hex.trim();
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new CommandError(`Malformed hex string "${hex}"`, "VALUE_OUT_OF_RANGE");
  }
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

function alarmConfig(param: number, value: number): Uint8Array {
  return Uint8Array.of(FRAME_ALARM_CONFIG, 0x00, param, value);
}

function checkRange(label: string, value: number, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new CommandError(
      `${label} must be an integer in [${min}, ${max}], got ${value}`,
      "VALUE_OUT_OF_RANGE"
    );
  }
  return value;
}

function minorBytesOf(beaconId: BeaconId): Uint8Array {
  const minor = minorIdOf(beaconId);
  if (!/^[0-9A-F]{4}$/.test(minor)) {
    throw new CommandError(
      `Beacon id "${beaconId}" has no hex minor id`,
      "INVALID_BEACON_ID"
    );
  }
  return fromHex(minor);
}

function parseMajor(raw: string): Uint8Array {
  const major = raw.trim();
  if (!/^[0-9a-fA-F]{4}$/.test(major)) {
    throw new CommandError(
      `Beacon major must be 4 hex digits, got "${raw}"`,
      "VALUE_OUT_OF_RANGE"
    );
  }
  return fromHex(major);
}

function unknownCommand(command: never): never {
  throw new CommandError(
    `Unknown command ${JSON.stringify(command)}`,
    "UNKNOWN_COMMAND"
  );
}
