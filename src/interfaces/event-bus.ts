/**
 * @module interfaces/event-bus
 * @description Typed event bus interface for the monitor's state-change
 * notifications.
 *
 * The event map ensures that listeners receive correctly-typed payloads
 * without runtime type checking.
 */

import type {
  MonitorEvent,
  MonitorEventMap,
  MonitorEventType,
} from "../types/events.js";

/**
 * Listener function signature for a specific event type.
 */
export type EventListener<T extends MonitorEventType> = (
  event: MonitorEventMap[T]
) => void;

/**
 * @interface IEventBus
 * @description In-process publish point. Publishers never observe
 * listener failures.
 */
export interface IEventBus {
  /**
   * Register a listener for a specific event type. Listeners run in
   * registration order.
   * @param eventType - The event type to listen for.
   * @param listener - Callback receiving the typed event payload.
   */
  on<T extends MonitorEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Remove a previously registered listener.
   */
  off<T extends MonitorEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Deliver an event to every listener of its type, synchronously.
   * A throwing listener is logged and skipped; the rest still run.
   */
  emit(event: MonitorEvent): void;
}
