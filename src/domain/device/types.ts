export type ConnectionStateValue =
  | "disconnected"
  | "scanning"
  | "connecting"
  | "connected"
  | "disconnecting";

export interface Device {
  address: string;
  name: string;
  rssi: number;
}

export interface CharacteristicInfo {
  id: string;
  properties: string[];
  description: string;
}

export interface ServiceInfo {
  id: string;
  description: string;
  characteristics: CharacteristicInfo[];
}

export interface ConnectionStateEvent {
  state: ConnectionStateValue;
  address: string | null;
}
