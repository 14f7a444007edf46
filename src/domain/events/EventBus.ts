export interface Subscription {
  unsubscribe(): void;
}

export type EventHandler<T> = (payload: T) => void | Promise<void>;

export interface EventBus {
  publish<T>(topic: string, payload: T): Promise<void>;
  subscribe<T>(topic: string, handler: EventHandler<T>): Subscription;
}

export const Topics = {
  RawNotify: "raw_notify",
  ButtonSingle: "button_single",
  ButtonDouble: "button_double",
  ButtonLong: "button_long",
  ConnectionState: "connection_state",
  ListenState: "listen_state",
  LlmChanged: "llm_changed",
  LlmOutput: "llm_output",
  Status: "status",
} as const;

export const GESTURE_TOPICS: readonly string[] = [
  Topics.ButtonSingle,
  Topics.ButtonDouble,
  Topics.ButtonLong,
];
