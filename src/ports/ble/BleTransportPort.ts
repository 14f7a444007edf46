export interface Advertisement {
  address: string;
  name: string;
  rssi: number;
}

export type AdvertisementHandler = (advertisement: Advertisement) => void;
export type NotificationCallback = (data: Buffer) => void;

export interface GattCharacteristic {
  uuid: string;
  properties: string[];
  description?: string;
}

export interface GattService {
  uuid: string;
  description?: string;
  characteristics: GattCharacteristic[];
}

export interface BleSession {
  readonly address: string;
  readonly isConnected: boolean;
  /** Fires once when the link drops, whoever dropped it. */
  onDisconnect(listener: () => void): () => void;
}

export interface BleTransportPort {
  /** Resolves once `durationSeconds` have elapsed and scanning has stopped. */
  scan(durationSeconds: number, onAdvertisement: AdvertisementHandler): Promise<void>;
  connectByAddress(address: string, timeoutSeconds: number): Promise<BleSession>;
  disconnect(session: BleSession): Promise<void>;
  listServices(session: BleSession): Promise<GattService[]>;
  startNotify(session: BleSession, characteristicId: string, callback: NotificationCallback): Promise<void>;
  stopNotify(session: BleSession, characteristicId: string): Promise<void>;
}
