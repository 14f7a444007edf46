import { Topics } from "../events/EventBus";

export interface RawNotifyPayload {
  uuid: string;
  hexPayload: string;
}

export interface GesturePayload {
  uuid: string;
  text: string;
}

export interface ClassifiedEvent {
  topic: string;
  payload: RawNotifyPayload | GesturePayload;
}

/**
 * Turns one raw GATT notification into bus events. The first event is always
 * the `raw_notify` trace; at most one gesture event follows it.
 */
export interface NotificationClassifier {
  classify(characteristicId: string, data: Uint8Array): ClassifiedEvent[];
}

/** token -> gesture topic */
export type TokenTable = Readonly<Record<string, string>>;

// The ring's real GATT protocol is unknown, so this table is a placeholder:
// swap it (or the whole classifier) once a device profile is available.
export const DEFAULT_GESTURE_TOKENS: TokenTable = {
  single: Topics.ButtonSingle,
  button_single: Topics.ButtonSingle,
  tap: Topics.ButtonSingle,
  double: Topics.ButtonDouble,
  button_double: Topics.ButtonDouble,
  dbl: Topics.ButtonDouble,
  long: Topics.ButtonLong,
  button_long: Topics.ButtonLong,
  hold: Topics.ButtonLong,
};

export function toHex(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString("hex");
}

/** Best-effort UTF-8: invalid sequences are dropped rather than replaced. */
export function decodeText(data: Uint8Array): string {
  const decoded = new TextDecoder("utf-8", { fatal: false }).decode(data);
  return decoded.replace(/\uFFFD/g, "").trim().toLowerCase();
}

export class TokenNotificationClassifier implements NotificationClassifier {
  constructor(private readonly tokens: TokenTable = DEFAULT_GESTURE_TOKENS) {}

  classify(characteristicId: string, data: Uint8Array): ClassifiedEvent[] {
    const events: ClassifiedEvent[] = [
      {
        topic: Topics.RawNotify,
        payload: { uuid: characteristicId, hexPayload: toHex(data) },
      },
    ];

    const text = decodeText(data);
    const topic = Object.prototype.hasOwnProperty.call(this.tokens, text)
      ? this.tokens[text]
      : undefined;
    if (topic) {
      events.push({ topic, payload: { uuid: characteristicId, text } });
    }
    return events;
  }
}
