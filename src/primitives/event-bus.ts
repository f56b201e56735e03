/**
 * @module primitives/event-bus
 * @description Typed in-process event bus.
 *
 * Listeners for each event type are kept in registration order. Delivery
 * is synchronous; a listener that throws is logged and the remaining
 * listeners still receive the event.
 */

import type { IEventBus, EventListener } from "../interfaces/event-bus.js";
import type {
  MonitorEvent,
  MonitorEventMap,
  MonitorEventType,
} from "../types/events.js";
import { componentLogger } from "../config/logger.js";
import type { Logger } from "../config/logger.js";

interface Registration {
  /** The caller's listener, kept for identity comparison in off(). */
  readonly listener: object;
  readonly invoke: (event: MonitorEvent) => void;
}

function isEventOfType<T extends MonitorEventType>(
  event: MonitorEvent,
  eventType: T
): event is MonitorEventMap[T] {
  return event.type === eventType;
}

export class AlarmEventBus implements IEventBus {
  private readonly registrations = new Map<MonitorEventType, Registration[]>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = componentLogger(logger, "event-bus");
  }

  on<T extends MonitorEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const list = this.registrations.get(eventType) ?? [];
    list.push({
      listener,
      invoke: (event) => {
        if (isEventOfType(event, eventType)) {
          listener(event);
        }
      },
    });
    this.registrations.set(eventType, list);
  }

  off<T extends MonitorEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const list = this.registrations.get(eventType);
    if (!list) return;
    const remaining = list.filter((r) => r.listener !== listener);
    if (remaining.length === 0) {
      this.registrations.delete(eventType);
    } else {
      this.registrations.set(eventType, remaining);
    }
  }

  emit(event: MonitorEvent): void {
    const list = this.registrations.get(event.type);
    if (!list) return;

    // Snapshot so a listener calling off() does not skip its neighbours
    for (const registration of [...list]) {
      try {
        registration.invoke(event);
      } catch (err) {
        this.logger.error(
          { err, eventType: event.type },
          "event listener failed"
        );
      }
    }
  }

  /**
   * Number of listeners registered for an event type.
   */
  listenerCount(eventType: MonitorEventType): number {
    return this.registrations.get(eventType)?.length ?? 0;
  }
}
