/**
 * @module interfaces/display
 * @description Push interface for status displays.
 */

import type { BeaconSnapshot } from "../types/beacon.js";

/**
 * @interface IStatusDisplay
 * @description Receives the current state of one beacon whenever it
 * changes, and of every beacon on periodic refresh.
 */
export interface IStatusDisplay {
  /**
   * Render the current state for one beacon.
   */
  render(snapshot: BeaconSnapshot): void;
}
