/**
 * @module interfaces/downlink
 * @description IDownlinkTransport: the outbound capability the core calls
 * to reach alarm devices.
 *
 * Fire-and-forget: resolution means the transport accepted the message,
 * not that the device acted on it. LoRaWAN class A devices only receive
 * after their next uplink, so there is no delivery acknowledgment.
 */

import type { DeviceEui } from "../types/branded.js";

/**
 * Errors that may be raised by IDownlinkTransport operations.
 */
export class DownlinkError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "NOT_CONNECTED"
      | "NO_APPLICATION"
      | "PUBLISH_FAILED"
  ) {
    super(message);
    this.name = "DownlinkError";
  }
}

/**
 * @interface IDownlinkTransport
 */
export interface IDownlinkTransport {
  /**
   * @command
   * @description Queue a downlink payload for a device.
   *
   * @param target - DevEUI of the receiving device.
   * @param payload - Application payload bytes.
   * @param port - LoRaWAN FPort.
   * @throws {DownlinkError} when the message could not be handed to the
   *   network server.
   */
  send(target: DeviceEui, payload: Uint8Array, port: number): Promise<void>;
}
