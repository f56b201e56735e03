/**
 * @module interfaces/dispatcher
 * @description IAlarmDispatcher: how the state machine asks for commands.
 *
 * Both operations return immediately. Commands for one device run in the
 * order they were requested; failures surface as DOWNLINK_FAILED events,
 * never as exceptions to the caller.
 */

import type { BeaconId, DeviceEui } from "../types/branded.js";

/**
 * @interface IAlarmDispatcher
 */
export interface IAlarmDispatcher {
  /**
   * @command
   * @description Queue a single mute command for a device.
   */
  sendStop(target: DeviceEui): void;

  /**
   * @command
   * @description Queue the trigger sequence (volume, duration, search
   * beacon) for a device.
   */
  runTriggerSequence(target: DeviceEui, beaconId: BeaconId): void;

  /**
   * @query
   * @description Resolves once every queued command has completed.
   */
  whenIdle(): Promise<void>;
}
