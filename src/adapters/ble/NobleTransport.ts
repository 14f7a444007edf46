import type { Characteristic, Peripheral } from "@abandonware/noble";
import type {
  AdvertisementHandler,
  BleSession,
  BleTransportPort,
  GattService,
  NotificationCallback,
} from "../../ports/ble/BleTransportPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { delay, withTimeout } from "../../shared/async";
import { describeError } from "../../shared/errors";

type Noble = typeof import("@abandonware/noble");

const POWER_ON_TIMEOUT_MS = 15_000;

function normalizeUuid(uuid: string): string {
  return uuid.replace(/-/g, "").toLowerCase();
}

function peripheralAddress(peripheral: Peripheral): string {
  // macOS hides MAC addresses; noble then only knows the CoreBluetooth id.
  return peripheral.address || peripheral.id;
}

function matchesAddress(peripheral: Peripheral, address: string): boolean {
  const wanted = address.toLowerCase();
  return (
    peripheral.address?.toLowerCase() === wanted ||
    peripheral.id.toLowerCase() === wanted ||
    peripheral.uuid.toLowerCase() === wanted
  );
}

type DataListener = (data: Buffer, isNotification: boolean) => void;

class NobleSession implements BleSession {
  private characteristics: Characteristic[] | null = null;
  readonly dataListeners = new Map<string, { characteristic: Characteristic; listener: DataListener }>();

  constructor(
    readonly address: string,
    readonly peripheral: Peripheral
  ) {}

  get isConnected(): boolean {
    return this.peripheral.state === "connected";
  }

  onDisconnect(listener: () => void): () => void {
    const handler = () => listener();
    this.peripheral.once("disconnect", handler);
    return () => {
      this.peripheral.removeListener("disconnect", handler);
    };
  }

  async discover() {
    const result = await this.peripheral.discoverAllServicesAndCharacteristicsAsync();
    this.characteristics = result.characteristics;
    return result;
  }

  async characteristic(uuid: string): Promise<Characteristic> {
    if (!this.characteristics) {
      await this.discover();
    }
    const wanted = normalizeUuid(uuid);
    const match = (this.characteristics ?? []).find((c) => normalizeUuid(c.uuid) === wanted);
    if (!match) {
      throw new Error(`Characteristic ${uuid} not found on ${this.address}.`);
    }
    return match;
  }
}

function asNobleSession(session: BleSession): NobleSession {
  if (!(session instanceof NobleSession)) {
    throw new Error("Session was not created by the noble transport.");
  }
  return session;
}

/**
 * Hardware transport on @abandonware/noble. The library is required on first
 * use so that merely importing this module never touches the radio.
 */
export class NobleTransport implements BleTransportPort {
  private noble: Noble | null = null;
  private readonly seen = new Map<string, Peripheral>();

  constructor(private readonly logger: LoggerPort) {}

  async scan(durationSeconds: number, onAdvertisement: AdvertisementHandler): Promise<void> {
    const noble = await this.ready();
    const onDiscover = (peripheral: Peripheral) => {
      const address = peripheralAddress(peripheral);
      this.seen.set(address.toLowerCase(), peripheral);
      onAdvertisement({
        address,
        name: peripheral.advertisement?.localName ?? "",
        rssi: peripheral.rssi,
      });
    };

    noble.on("discover", onDiscover);
    try {
      // Duplicates on, so later advertisements refresh RSSI.
      await noble.startScanningAsync([], true);
      await delay(durationSeconds * 1000);
    } finally {
      noble.removeListener("discover", onDiscover);
      await noble.stopScanningAsync();
    }
  }

  async connectByAddress(address: string, timeoutSeconds: number): Promise<BleSession> {
    const timeoutMs = timeoutSeconds * 1000;
    const peripheral = await this.findPeripheral(address, timeoutMs);
    if (peripheral.state !== "connected") {
      const connecting = peripheral.connectAsync();
      try {
        await withTimeout(
          connecting,
          timeoutMs,
          () => new Error(`Connection to ${address} timed out after ${timeoutSeconds}s.`)
        );
      } catch (err) {
        // Forget the handle so a retry resolves the address afresh.
        this.seen.delete(address.toLowerCase());
        this.abandon(address, peripheral, connecting);
        throw err;
      }
    }
    this.logger.debug(`Peripheral ${address} state after connect: ${peripheral.state}`);
    return new NobleSession(address, peripheral);
  }

  async disconnect(session: BleSession): Promise<void> {
    const nobleSession = asNobleSession(session);
    for (const { characteristic, listener } of nobleSession.dataListeners.values()) {
      characteristic.removeListener("data", listener);
    }
    nobleSession.dataListeners.clear();
    await nobleSession.peripheral.disconnectAsync();
  }

  async listServices(session: BleSession): Promise<GattService[]> {
    const { services } = await asNobleSession(session).discover();
    return services.map((service) => ({
      uuid: service.uuid,
      description: service.name ?? "",
      characteristics: service.characteristics.map((characteristic) => ({
        uuid: characteristic.uuid,
        properties: [...characteristic.properties],
        description: characteristic.name ?? "",
      })),
    }));
  }

  async startNotify(
    session: BleSession,
    characteristicId: string,
    callback: NotificationCallback
  ): Promise<void> {
    const nobleSession = asNobleSession(session);
    const characteristic = await nobleSession.characteristic(characteristicId);
    const listener: DataListener = (data) => callback(data);
    characteristic.on("data", listener);
    try {
      await characteristic.subscribeAsync();
    } catch (err) {
      characteristic.removeListener("data", listener);
      throw err;
    }
    nobleSession.dataListeners.set(normalizeUuid(characteristicId), { characteristic, listener });
  }

  async stopNotify(session: BleSession, characteristicId: string): Promise<void> {
    const nobleSession = asNobleSession(session);
    const key = normalizeUuid(characteristicId);
    const entry = nobleSession.dataListeners.get(key);
    if (!entry) return;
    nobleSession.dataListeners.delete(key);
    entry.characteristic.removeListener("data", entry.listener);
    await entry.characteristic.unsubscribeAsync();
  }

  /** A connect that completes after we gave up on it must not leave the ring linked. */
  private abandon(address: string, peripheral: Peripheral, connecting: Promise<void>): void {
    connecting
      .then(
        async () => {
          this.logger.debug(`Late connect to ${address}; disconnecting`);
          await peripheral.disconnectAsync();
        },
        () => undefined
      )
      .catch((err: unknown) => {
        this.logger.warn(`Dropping abandoned connection to ${address} failed`, { error: describeError(err) });
      });
  }

  private load(): Noble {
    if (this.noble) return this.noble;
    // noble exports an EventEmitter instance; a namespace import would drop its prototype methods.
    const noble: Noble = require("@abandonware/noble");
    this.noble = noble;
    return noble;
  }

  private async ready(): Promise<Noble> {
    const noble = this.load();
    if (noble._state === "poweredOn") return noble;

    this.logger.info(`Waiting for Bluetooth adapter (state: ${noble._state})`);
    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        noble.removeListener("stateChange", onState);
        reject(new Error(`Bluetooth adapter not powered on after ${POWER_ON_TIMEOUT_MS / 1000}s.`));
      }, POWER_ON_TIMEOUT_MS);
      const onState = (state: string) => {
        if (state !== "poweredOn") return;
        clearTimeout(timer);
        noble.removeListener("stateChange", onState);
        resolve();
      };
      noble.on("stateChange", onState);
    });
    return noble;
  }

  private async findPeripheral(address: string, timeoutMs: number): Promise<Peripheral> {
    const cached = this.seen.get(address.toLowerCase());
    if (cached) return cached;

    const noble = await this.ready();
    return new Promise<Peripheral>((resolve, reject) => {
      const finish = (result: Peripheral | Error) => {
        clearTimeout(timer);
        noble.removeListener("discover", onDiscover);
        noble.stopScanningAsync().then(
          () => (result instanceof Error ? reject(result) : resolve(result)),
          reject
        );
      };
      const onDiscover = (peripheral: Peripheral) => {
        if (!matchesAddress(peripheral, address)) return;
        this.seen.set(peripheralAddress(peripheral).toLowerCase(), peripheral);
        finish(peripheral);
      };
      const timer = setTimeout(
        () => finish(new Error(`Device with address ${address} was not found.`)),
        timeoutMs
      );
      noble.on("discover", onDiscover);
      noble.startScanningAsync([], false).catch((err: unknown) => {
        finish(err instanceof Error ? err : new Error(String(err)));
      });
    });
  }
}
