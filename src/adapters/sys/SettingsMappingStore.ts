import type { MappingData, MappingStore } from "../../domain/mapping/MappingTable";
import type { JsonSettingsStore } from "./JsonSettingsStore";

/** Exposes only the `mappings` section of the settings file. */
export class SettingsMappingStore implements MappingStore {
  constructor(private readonly settings: JsonSettingsStore) {}

  load(): MappingData {
    return this.settings.reloadSection("mappings");
  }

  save(mappings: MappingData): Promise<void> {
    return this.settings.update((current) => {
      current.mappings = mappings;
    });
  }
}
