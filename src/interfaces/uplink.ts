/**
 * @module interfaces/uplink
 * @description IUplinkSource: where decoded gateway reports come from.
 */

import type { UplinkReport } from "../codec/uplink.js";

/**
 * @interface IUplinkSource
 */
export interface IUplinkSource {
  /**
   * @command
   * @description Begin receiving uplinks.
   */
  start(): Promise<void>;

  /**
   * @command
   * @description Stop receiving and release the connection.
   */
  close(): Promise<void>;

  /**
   * Register a handler for decoded reports. Undecodable messages never
   * reach handlers.
   * @returns Unsubscribe function.
   */
  onUplink(handler: (report: UplinkReport) => void): () => void;
}
