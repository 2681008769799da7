import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { EventTypes } from '../constants/event-types';
import { Event, EventOfType } from '../interfaces/event.interface';

type EventHandler<T extends EventTypes = EventTypes> = (event: EventOfType<T>) => void;

@Injectable()
export class EventBusService {
  private readonly logger = new Logger(EventBusService.name);
  private readonly subscribers: Map<EventTypes, Set<(event: Event) => void>> = new Map();

  constructor(private readonly eventEmitter: EventEmitter2) {}

  publish(event: Event): void {
    try {
      this.eventEmitter.emit(event.type, event);
    } catch (error) {
      this.logger.error(`Failed to publish event: ${event.type}`, {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      throw error;
    }
  }

  /**
   * Subscribes to one event type. Returns the listener actually registered
   * on the emitter so it can be passed to unsubscribe.
   */
  subscribe<T extends EventTypes>(
    eventType: T,
    handler: EventHandler<T>,
  ): (event: Event) => void {
    const listener = (event: Event): void => {
      if (isEventOfType(event, eventType)) {
        handler(event);
      }
    };

    let handlers = this.subscribers.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.subscribers.set(eventType, handlers);
    }
    handlers.add(listener);
    this.eventEmitter.on(eventType, listener);

    return listener;
  }

  unsubscribe(eventType: EventTypes, listener: (event: Event) => void): void {
    const handlers = this.subscribers.get(eventType);
    if (handlers?.delete(listener)) {
      this.eventEmitter.off(eventType, listener);
    }
  }

  unsubscribeAll(eventType: EventTypes): void {
    const handlers = this.subscribers.get(eventType);
    if (handlers) {
      handlers.forEach((listener) => {
        this.eventEmitter.off(eventType, listener);
      });
      handlers.clear();
    }
  }
}

function isEventOfType<T extends EventTypes>(
  event: Event,
  eventType: T,
): event is EventOfType<T> {
  return event.type === eventType;
}
