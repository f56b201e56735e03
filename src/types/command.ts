/**
 * @module types/command
 * @description Logical downlink commands understood by the alarm device.
 */

import type { BeaconId } from "./branded.js";

/**
 * A logical command. The codec turns it into device bytes.
 */
export type DownlinkCommand =
  | { readonly kind: "MUTE" }
  | { readonly kind: "UNMUTE" }
  | { readonly kind: "SET_VOLUME"; readonly level: number }
  | { readonly kind: "SET_DURATION"; readonly units: number }
  | { readonly kind: "SEARCH_BEACON"; readonly beaconId: BeaconId };

export type CommandKind = DownlinkCommand["kind"];

/**
 * What started a trigger sequence.
 */
export type AlarmCause = "DEBOUNCE_ELAPSED" | "SIGNAL_LOST" | "MANUAL";
