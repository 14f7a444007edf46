import { EventEmitter } from "events";
import type {
  Advertisement,
  AdvertisementHandler,
  BleSession,
  BleTransportPort,
  GattService,
  NotificationCallback,
} from "../../ports/ble/BleTransportPort";
import { delay } from "../../shared/async";

export const SIMULATED_RING_ADDRESS = "SIM:00:00:00:00:01";
export const SIMULATED_SERVICE_UUID = "0000ffe0-0000-1000-8000-00805f9b34fb";
export const SIMULATED_NOTIFY_UUID = "0000ffe1-0000-1000-8000-00805f9b34fb";

class SimulatedSession implements BleSession {
  private connected = true;
  private readonly events = new EventEmitter();

  constructor(readonly address: string) {}

  get isConnected(): boolean {
    return this.connected;
  }

  onDisconnect(listener: () => void): () => void {
    this.events.on("disconnect", listener);
    return () => {
      this.events.off("disconnect", listener);
    };
  }

  drop() {
    if (!this.connected) return;
    this.connected = false;
    this.events.emit("disconnect");
  }
}

export interface SimulatedRingOptions {
  advertisements?: Advertisement[];
  services?: GattService[];
  /** Real seconds to wait per scan second; 0 makes scans instant. */
  scanTimeScale?: number;
}

type ConnectOutcome = "ok" | "not-connected" | Error;
type FailingOperation = "scan" | "listServices" | "startNotify" | "stopNotify" | "disconnect";

/**
 * In-process ring used by `--simulate` and by the tests. Connect outcomes can
 * be scripted, and `press()` emits the same text tokens a ring would notify.
 */
export class SimulatedRingTransport implements BleTransportPort {
  private advertisements: Advertisement[];
  private readonly services: GattService[];
  private readonly scanTimeScale: number;
  private readonly scripted: ConnectOutcome[] = [];
  private readonly notifiers = new Map<string, NotificationCallback>();
  private session: SimulatedSession | null = null;
  private readonly failures = new Map<FailingOperation, Error>();

  connectAttempts = 0;

  constructor(options: SimulatedRingOptions = {}) {
    this.advertisements = options.advertisements ?? [
      { address: SIMULATED_RING_ADDRESS, name: "Simulated Ring", rssi: -42 },
    ];
    this.services = options.services ?? [
      {
        uuid: SIMULATED_SERVICE_UUID,
        description: "Ring buttons",
        characteristics: [
          { uuid: SIMULATED_NOTIFY_UUID, properties: ["notify", "read"], description: "Button events" },
        ],
      },
    ];
    this.scanTimeScale = Math.max(0, options.scanTimeScale ?? 1);
  }

  setAdvertisements(advertisements: Advertisement[]): void {
    this.advertisements = advertisements;
  }

  /** Queues outcomes for the next connect attempts; unscripted attempts succeed. */
  scriptConnects(...outcomes: ConnectOutcome[]): void {
    this.scripted.push(...outcomes);
  }

  failNext(operation: FailingOperation, error: Error): void {
    this.failures.set(operation, error);
  }

  async scan(durationSeconds: number, onAdvertisement: AdvertisementHandler): Promise<void> {
    this.throwIfFailing("scan");
    for (const advertisement of this.advertisements) {
      onAdvertisement({ ...advertisement });
    }
    await delay(durationSeconds * 1000 * this.scanTimeScale);
  }

  async connectByAddress(address: string): Promise<BleSession> {
    this.connectAttempts += 1;
    const outcome = this.scripted.shift() ?? "ok";
    if (outcome instanceof Error) throw outcome;
    const known = this.advertisements.some((adv) => adv.address === address);
    if (!known) {
      throw new Error(`Device with address ${address} was not found.`);
    }
    const session = new SimulatedSession(address);
    if (outcome === "not-connected") {
      session.drop();
      return session;
    }
    this.session = session;
    return session;
  }

  async disconnect(session: BleSession): Promise<void> {
    this.throwIfFailing("disconnect");
    const current = this.session;
    if (current && current === session) {
      this.notifiers.clear();
      this.session = null;
      current.drop();
    }
  }

  async listServices(): Promise<GattService[]> {
    this.throwIfFailing("listServices");
    return this.services.map((service) => ({
      ...service,
      characteristics: service.characteristics.map((c) => ({ ...c, properties: [...c.properties] })),
    }));
  }

  async startNotify(_session: BleSession, characteristicId: string, callback: NotificationCallback): Promise<void> {
    this.throwIfFailing("startNotify");
    this.notifiers.set(characteristicId, callback);
  }

  async stopNotify(_session: BleSession, characteristicId: string): Promise<void> {
    this.throwIfFailing("stopNotify");
    this.notifiers.delete(characteristicId);
  }

  isNotifying(characteristicId: string): boolean {
    return this.notifiers.has(characteristicId);
  }

  /** Delivers a raw notification as the transport would. */
  notify(characteristicId: string, data: Buffer | string): void {
    const callback = this.notifiers.get(characteristicId);
    callback?.(typeof data === "string" ? Buffer.from(data, "utf8") : data);
  }

  press(gesture: "single" | "double" | "long", characteristicId = SIMULATED_NOTIFY_UUID): void {
    this.notify(characteristicId, gesture);
  }

  /** Simulates the ring walking out of range. */
  dropLink(): void {
    this.notifiers.clear();
    this.session?.drop();
    this.session = null;
  }

  private throwIfFailing(operation: FailingOperation) {
    const error = this.failures.get(operation);
    if (!error) return;
    this.failures.delete(operation);
    throw error;
  }
}
