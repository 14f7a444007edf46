import type { ConnectionStateValue } from "./types";

type StateListener = (state: ConnectionStateValue) => void;

export class ConnectionState {
  private current: ConnectionStateValue = "disconnected";
  private readonly listeners = new Set<StateListener>();

  get value(): ConnectionStateValue {
    return this.current;
  }

  onChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  toDisconnected() {
    this.set("disconnected");
  }

  toScanning() {
    this.set("scanning");
  }

  toConnecting() {
    this.set("connecting");
  }

  toConnected() {
    this.set("connected");
  }

  toDisconnecting() {
    this.set("disconnecting");
  }

  private set(next: ConnectionStateValue) {
    if (next === this.current) return;
    this.current = next;
    for (const listener of this.listeners) {
      listener(next);
    }
  }
}
