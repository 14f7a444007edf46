import { loadSettings, saveSettings, type AppSettings } from "../../config";
import type { SettingsStorePort } from "../../ports/sys/SettingsStorePort";

export class JsonSettingsStore implements SettingsStorePort {
  private settings: AppSettings;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly configPath: string,
    initial?: AppSettings
  ) {
    this.settings = initial ?? loadSettings(configPath).settings;
  }

  get path(): string {
    return this.configPath;
  }

  current(): AppSettings {
    return this.settings;
  }

  /** Re-reads one section from disk, leaving the rest of memory untouched. */
  reloadSection<K extends keyof AppSettings>(key: K): AppSettings[K] {
    const value = loadSettings(this.configPath).settings[key];
    this.settings[key] = value;
    return value;
  }

  update(change: (settings: AppSettings) => void): Promise<void> {
    change(this.settings);
    const snapshot = structuredClone(this.settings);
    const write = this.writeQueue.then(() => saveSettings(this.configPath, snapshot));
    // Keep the queue alive after a failed write; the caller still sees the rejection.
    this.writeQueue = write.catch(() => undefined);
    return write;
  }
}
