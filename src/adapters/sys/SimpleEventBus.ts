import type { EventBus, EventHandler, Subscription } from "../../domain/events/EventBus";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { describeError } from "../../shared/errors";

type Handler = EventHandler<unknown>;

interface Registration {
  handler: Handler;
}

export class SimpleEventBus implements EventBus {
  private readonly handlers = new Map<string, Registration[]>();

  constructor(private readonly logger?: LoggerPort) {}

  async publish<T>(topic: string, payload: T): Promise<void> {
    const registrations = this.handlers.get(topic);
    if (!registrations) return;
    // Snapshot so subscriptions added mid-publish wait for the next one.
    for (const { handler } of registrations.slice()) {
      try {
        await handler(payload);
      } catch (err) {
        this.logger?.warn(`Event handler for topic ${topic} failed`, {
          error: describeError(err),
        });
      }
    }
  }

  subscribe<T>(topic: string, handler: EventHandler<T>): Subscription {
    let registrations = this.handlers.get(topic);
    if (!registrations) {
      registrations = [];
      this.handlers.set(topic, registrations);
    }
    // Each registration is its own object so the same function can be
    // subscribed twice and unsubscribed once.
    const registration: Registration = {
      handler: (payload) => handler(payload as T),
    };
    registrations.push(registration);

    return {
      unsubscribe: () => {
        const current = this.handlers.get(topic);
        if (!current) return;
        const index = current.indexOf(registration);
        if (index >= 0) current.splice(index, 1);
        if (current.length === 0) {
          this.handlers.delete(topic);
        }
      },
    };
  }

  subscriberCount(topic: string): number {
    return this.handlers.get(topic)?.length ?? 0;
  }
}
