import type { EventBus } from "../domain/events/EventBus";
import { Topics } from "../domain/events/EventBus";
import { ConnectionState } from "../domain/device/ConnectionState";
import {
  ConnectionError,
  NotConnectedError,
  TransportCallError,
} from "../domain/device/errors";
import type {
  ConnectionStateEvent,
  ConnectionStateValue,
  Device,
  ServiceInfo,
} from "../domain/device/types";
import type { NotificationClassifier } from "../domain/gestures/NotificationClassifier";
import { TokenNotificationClassifier } from "../domain/gestures/NotificationClassifier";
import type { Advertisement, BleSession, BleTransportPort } from "../ports/ble/BleTransportPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { delay } from "../shared/async";
import { describeError } from "../shared/errors";

export const DEFAULT_CONNECT_TIMEOUT_SECONDS = 12;
export const DEFAULT_SCAN_SECONDS = 5;

export interface DeviceConnectionOptions {
  classifier?: NotificationClassifier;
  /** Pause between the first failed connect and the retry. */
  retryBackoffMs?: number;
}

export interface ConnectedSession {
  address: string;
}

interface ActiveLink {
  session: BleSession;
  detachDropListener: () => void;
}

/**
 * Owns the single BLE session of the process. State only changes through the
 * methods below or when the transport reports a dropped link.
 */
export class DeviceConnection {
  private readonly state = new ConnectionState();
  private readonly classifier: NotificationClassifier;
  private readonly retryBackoffMs: number;
  private link: ActiveLink | null = null;
  private pendingAddress: string | null = null;
  private readonly notifying = new Set<string>();

  constructor(
    private readonly transport: BleTransportPort,
    private readonly bus: EventBus,
    private readonly logger: LoggerPort,
    options: DeviceConnectionOptions = {}
  ) {
    this.classifier = options.classifier ?? new TokenNotificationClassifier();
    this.retryBackoffMs = Math.max(0, options.retryBackoffMs ?? 500);
    this.state.onChange((value) => this.announce(value));
  }

  get connectionState(): ConnectionStateValue {
    return this.state.value;
  }

  get address(): string | null {
    return this.link?.session.address ?? null;
  }

  subscriptions(): string[] {
    return Array.from(this.notifying);
  }

  async scan(durationSeconds: number = DEFAULT_SCAN_SECONDS): Promise<Device[]> {
    if (this.state.value !== "disconnected") {
      throw new TransportCallError("scan", `Cannot scan while ${this.state.value}.`);
    }

    const seen = new Map<string, Advertisement>();
    this.state.toScanning();
    try {
      await this.transport.scan(durationSeconds, (advertisement) => {
        seen.set(advertisement.address, advertisement);
      });
    } catch (err) {
      throw TransportCallError.wrap("scan", err);
    } finally {
      this.state.toDisconnected();
    }

    const devices = Array.from(seen.values()).map((adv) => ({
      address: adv.address,
      name: adv.name.trim(),
      rssi: Math.trunc(adv.rssi || 0),
    }));
    devices.sort((a, b) => b.rssi - a.rssi);
    this.logger.info(`Scan finished: ${devices.length} device(s)`, { seconds: durationSeconds });
    return devices;
  }

  async connect(
    address: string,
    timeoutSeconds: number = DEFAULT_CONNECT_TIMEOUT_SECONDS
  ): Promise<ConnectedSession> {
    const target = address.trim();
    if (!target) {
      throw new ConnectionError(address, "No BLE address set.");
    }
    const current = this.state.value;
    if (current === "connected") {
      await this.disconnect();
    } else if (current !== "disconnected") {
      throw new ConnectionError(target, `Cannot connect while ${current}.`);
    }

    this.pendingAddress = target;
    this.state.toConnecting();
    let session: BleSession;
    try {
      session = await this.connectWithRetry(target, timeoutSeconds);
      if (!session.isConnected) {
        await this.release(session);
        throw new NotConnectedError(target);
      }
    } catch (err) {
      this.state.toDisconnected();
      throw err;
    } finally {
      this.pendingAddress = null;
    }

    const detachDropListener = session.onDisconnect(() => this.handleDrop(session));
    this.link = { session, detachDropListener };
    this.state.toConnected();
    this.logger.info(`Connected BLE: ${target}`);
    return { address: target };
  }

  async disconnect(): Promise<void> {
    const link = this.link;
    if (!link) return;

    this.state.toDisconnecting();
    link.detachDropListener();
    try {
      await this.transport.disconnect(link.session);
    } catch (err) {
      this.logger.warn("Transport failed while disconnecting", { error: describeError(err) });
    } finally {
      this.clearLink();
      this.logger.info("Disconnected BLE.");
    }
  }

  /** Best-effort teardown of a session that never became the active link. */
  private async release(session: BleSession): Promise<void> {
    try {
      await this.transport.disconnect(session);
    } catch (err) {
      this.logger.warn("Releasing an unconnected session failed", { error: describeError(err) });
    }
  }

  async listCharacteristics(): Promise<ServiceInfo[]> {
    const session = this.connectedSession();
    if (!session) return [];
    try {
      const services = await this.transport.listServices(session);
      return services.map((service) => ({
        id: service.uuid,
        description: service.description ?? "",
        characteristics: service.characteristics.map((characteristic) => ({
          id: characteristic.uuid,
          properties: [...characteristic.properties],
          description: characteristic.description ?? "",
        })),
      }));
    } catch (err) {
      this.logger.warn("Listing GATT services failed", { error: describeError(err) });
      return [];
    }
  }

  async subscribeNotify(characteristicId: string): Promise<void> {
    const session = this.connectedSession();
    if (!session) {
      throw new TransportCallError("subscribe", "Not connected.");
    }
    if (this.notifying.has(characteristicId)) {
      this.logger.debug(`Already subscribed to ${characteristicId}`);
      return;
    }

    this.notifying.add(characteristicId);
    try {
      await this.transport.startNotify(session, characteristicId, (data) =>
        this.handleNotification(session, characteristicId, data)
      );
    } catch (err) {
      this.notifying.delete(characteristicId);
      throw TransportCallError.wrap("subscribe", err);
    }
    if (this.link?.session !== session) {
      throw new TransportCallError("subscribe", "Link dropped while subscribing.");
    }
    this.logger.info(`Subscribed notify: ${characteristicId}`);
  }

  async unsubscribeNotify(characteristicId: string): Promise<void> {
    const session = this.connectedSession();
    if (!session) return;
    try {
      await this.transport.stopNotify(session, characteristicId);
    } catch (err) {
      this.logger.warn(`Stopping notify on ${characteristicId} failed`, {
        error: describeError(err),
      });
    }
    this.notifying.delete(characteristicId);
    this.logger.info(`Unsubscribed notify: ${characteristicId}`);
  }

  async close(): Promise<void> {
    await this.disconnect();
  }

  private async connectWithRetry(address: string, timeoutSeconds: number): Promise<BleSession> {
    try {
      return await this.transport.connectByAddress(address, timeoutSeconds);
    } catch (firstError) {
      this.logger.warn(`Connect to ${address} failed, retrying once`, {
        error: describeError(firstError),
      });
      await delay(this.retryBackoffMs);
      try {
        return await this.transport.connectByAddress(address, timeoutSeconds);
      } catch (secondError) {
        this.logger.debug("Retry failed", { error: describeError(secondError) });
        // The first failure is usually the more diagnostic one.
        throw ConnectionError.fromCause(address, firstError);
      }
    }
  }

  private handleNotification(session: BleSession, characteristicId: string, data: Buffer) {
    if (this.link?.session !== session || !this.notifying.has(characteristicId)) return;
    const events = this.classifier.classify(characteristicId, data);
    for (const event of events) {
      void this.bus.publish(event.topic, event.payload);
    }
  }

  private handleDrop(session: BleSession) {
    if (this.link?.session !== session) return;
    this.logger.warn(`BLE link to ${session.address} dropped`);
    this.clearLink();
  }

  private connectedSession(): BleSession | null {
    if (this.state.value !== "connected" || !this.link) return null;
    return this.link.session;
  }

  private clearLink() {
    this.link?.detachDropListener();
    this.link = null;
    this.notifying.clear();
    this.state.toDisconnected();
  }

  private announce(state: ConnectionStateValue) {
    const event: ConnectionStateEvent = {
      state,
      address: this.link?.session.address ?? this.pendingAddress,
    };
    void this.bus.publish(Topics.ConnectionState, event);
  }
}
