import type { LoggerPort } from "../ports/sys/LoggerPort";
import { describeError } from "../shared/errors";

export interface ActionPayload {
  action: string;
  topic?: string;
  payload?: unknown;
}

export type ActionHandler = (payload: ActionPayload) => Promise<void> | void;

export class ActionRouter {
  private readonly handlersByName = new Map<string, ActionHandler>();

  constructor(private readonly logger: LoggerPort) {}

  /** Replaces any handler already registered under `action`. */
  register(action: string, handler: ActionHandler): void {
    this.handlersByName.set(action, handler);
  }

  has(action: string): boolean {
    return this.handlersByName.has(action);
  }

  names(): string[] {
    return Array.from(this.handlersByName.keys());
  }

  async dispatch(action: string, payload?: ActionPayload): Promise<void> {
    const handler = this.handlersByName.get(action);
    if (!handler) {
      // Mapping tables may name actions this build does not provide.
      this.logger.debug(`No handler registered for action "${action}"`);
      return;
    }

    try {
      await handler(payload ?? { action });
    } catch (err) {
      this.logger.warn(`Action "${action}" failed`, { error: describeError(err) });
    }
  }
}
