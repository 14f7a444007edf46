import type { AppSettings } from "../../config";

export interface SettingsStorePort {
  current(): AppSettings;
  /** Applies the change in memory, then writes the whole file. */
  update(change: (settings: AppSettings) => void): Promise<void>;
}
