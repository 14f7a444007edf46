import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { describeError } from "../../shared/errors";

/** action name -> trigger topics */
export type MappingData = Record<string, string[]>;

export interface MappingStore {
  load(): MappingData;
  save(mappings: MappingData): Promise<void>;
}

export interface MappingRow {
  topic: string;
  action: string;
}

export function defaultMappings(): MappingData {
  return {
    toggle_listen: ["button_single"],
    send_last_transcript: ["button_double"],
    cycle_llm: ["button_long"],
  };
}

/**
 * Accepts whatever came out of the settings file. Anything that is not an
 * object of string arrays is dropped; a non-object falls back to defaults.
 */
export function normalizeMappings(input: unknown): MappingData {
  if (!input || typeof input !== "object" || Array.isArray(input)) {
    return defaultMappings();
  }

  const out: MappingData = {};
  for (const [action, value] of Object.entries(input)) {
    const name = action.trim();
    if (!name || !Array.isArray(value)) continue;
    const topics: string[] = [];
    for (const entry of value) {
      if (typeof entry !== "string") continue;
      const topic = entry.trim();
      if (topic && !topics.includes(topic)) topics.push(topic);
    }
    out[name] = topics;
  }
  return out;
}

export class MappingTable {
  private readonly table = new Map<string, string[]>();
  private flushQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: MappingStore,
    private readonly logger: LoggerPort
  ) {
    this.fill(store.load());
  }

  actions(): string[] {
    return Array.from(this.table.keys());
  }

  triggers(action: string): string[] {
    return [...(this.table.get(action) ?? [])];
  }

  triggersFor(topic: string): string[] {
    const matches: string[] = [];
    for (const [action, topics] of this.table) {
      if (topics.includes(topic)) matches.push(action);
    }
    return matches;
  }

  rows(): MappingRow[] {
    const rows: MappingRow[] = [];
    for (const [action, topics] of this.table) {
      for (const topic of topics) rows.push({ topic, action });
    }
    return rows;
  }

  snapshot(): MappingData {
    const out: MappingData = {};
    for (const [action, topics] of this.table) {
      out[action] = [...topics];
    }
    return out;
  }

  addMapping(action: string, topic: string): Promise<void> {
    let topics = this.table.get(action);
    if (!topics) {
      topics = [];
      this.table.set(action, topics);
    }
    if (!topics.includes(topic)) topics.push(topic);
    return this.flush();
  }

  removeMapping(action: string, topic: string): Promise<void> {
    const topics = this.table.get(action);
    const index = topics ? topics.indexOf(topic) : -1;
    if (topics && index >= 0) topics.splice(index, 1);
    return this.flush();
  }

  replace(data: MappingData): Promise<void> {
    this.fill(normalizeMappings(data));
    return this.flush();
  }

  /** Re-reads the store once queued flushes have landed. Nothing is written back. */
  async reload(): Promise<void> {
    await this.flushQueue;
    this.fill(this.store.load());
  }

  /** Settles once every flush requested so far has been attempted. */
  whenFlushed(): Promise<void> {
    return this.flushQueue;
  }

  private fill(data: MappingData) {
    this.table.clear();
    for (const [action, topics] of Object.entries(normalizeMappings(data))) {
      this.table.set(action, topics);
    }
  }

  private flush(): Promise<void> {
    const snapshot = this.snapshot();
    this.flushQueue = this.flushQueue.then(async () => {
      try {
        await this.store.save(snapshot);
      } catch (err) {
        this.logger.warn("Saving mappings failed; keeping in-memory table", {
          error: describeError(err),
        });
      }
    });
    return this.flushQueue;
  }
}
