import type { EventBus, Subscription } from "../domain/events/EventBus";
import { GESTURE_TOPICS } from "../domain/events/EventBus";
import type { MappingTable } from "../domain/mapping/MappingTable";
import type { ActionRouter } from "./ActionRouter";

/** Routes gesture topics through the mapping table into the action router. */
export class GestureDispatcher {
  private subscriptions: Subscription[] = [];

  constructor(
    private readonly bus: EventBus,
    private readonly mappings: MappingTable,
    private readonly router: ActionRouter
  ) {}

  wire(topics: readonly string[] = GESTURE_TOPICS): void {
    this.unwire();
    this.subscriptions = topics.map((topic) =>
      this.bus.subscribe<unknown>(topic, (payload) => this.route(topic, payload))
    );
  }

  unwire(): void {
    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    this.subscriptions = [];
  }

  async route(topic: string, payload: unknown): Promise<void> {
    for (const action of this.mappings.triggersFor(topic)) {
      await this.router.dispatch(action, { action, topic, payload });
    }
  }
}
