import type { AppSettings } from "../config";
import type { EventBus } from "../domain/events/EventBus";
import { Topics } from "../domain/events/EventBus";
import type { SettingsStorePort } from "../ports/sys/SettingsStorePort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { describeError } from "../shared/errors";
import type { ActionRouter } from "./ActionRouter";
import type { ConnectedSession, DeviceConnection } from "./DeviceConnection";
import type { ProviderRegistry } from "./ProviderRegistry";

export const BUILTIN_ACTIONS = ["toggle_listen", "send_last_transcript", "cycle_llm", "noop"] as const;

export interface LlmOutputEvent {
  providerId: string;
  model: string;
  temperature: number;
  prompt: string;
  text: string;
}

export interface ListenStateEvent {
  enabled: boolean;
}

export interface LlmChangedEvent {
  providerId: string;
}

export const PROVIDER_FIELDS = ["model", "temperature", "url", "key"] as const;
export type ProviderField = (typeof PROVIDER_FIELDS)[number];

export function isProviderField(value: string): value is ProviderField {
  return PROVIDER_FIELDS.some((field) => field === value);
}

export interface ProviderSettingsView {
  model: string;
  temperature: number;
  baseUrl: string;
  /** Undefined for backends without auth. */
  hasApiKey?: boolean;
}

interface ProviderSection {
  model: string;
  temperature: number;
  baseUrl: string;
  apiKey?: string;
}

function sectionFor(providerId: string, settings: AppSettings): ProviderSection | null {
  switch (providerId) {
    case "openai":
      return settings.openai;
    case "ollama":
      return settings.ollama;
    case "openai_compat":
      return settings.openaiCompat;
    default:
      return null;
  }
}

function parseTemperature(value: string): number {
  const temperature = Number(value);
  if (!value || !Number.isFinite(temperature) || temperature < 0 || temperature > 2) {
    throw new Error(`Temperature must be a number from 0 to 2, got "${value}".`);
  }
  return temperature;
}

/**
 * Application state behind the ring: listening flag, last transcript and the
 * active LLM provider. Its handlers are what the mapping table ends up firing.
 */
export class ControlPanel {
  private listening = false;
  private lastTranscript = "";

  constructor(
    private readonly bus: EventBus,
    private readonly router: ActionRouter,
    private readonly providers: ProviderRegistry,
    private readonly settings: SettingsStorePort,
    private readonly device: DeviceConnection,
    private readonly logger: LoggerPort
  ) {}

  get isListening(): boolean {
    return this.listening;
  }

  get activeProviderId(): string {
    return this.settings.current().activeProvider;
  }

  get lastPrompt(): string {
    return this.lastTranscript;
  }

  registerActions(): void {
    this.router.register("toggle_listen", async () => {
      this.toggleListen();
    });
    this.router.register("send_last_transcript", async () => {
      await this.sendLastTranscript();
    });
    this.router.register("cycle_llm", async () => {
      await this.cycleProvider();
    });
    this.router.register("noop", async () => undefined);
  }

  toggleListen(): boolean {
    this.listening = !this.listening;
    this.logger.info(this.listening ? "Listening enabled" : "Listening disabled");
    const event: ListenStateEvent = { enabled: this.listening };
    void this.bus.publish(Topics.ListenState, event);
    return this.listening;
  }

  async cycleProvider(): Promise<string | null> {
    const next = this.providers.nextId(this.activeProviderId);
    if (!next) return null;
    await this.selectProvider(next);
    return next;
  }

  async selectProvider(providerId: string): Promise<void> {
    if (!this.providers.get(providerId)) {
      throw new Error(`Unknown LLM provider: ${providerId}`);
    }
    await this.persist((settings) => {
      settings.activeProvider = providerId;
    });
    this.logger.info(`Active LLM: ${providerId}`);
    const event: LlmChangedEvent = { providerId };
    await this.bus.publish(Topics.LlmChanged, event);
  }

  async sendLastTranscript(): Promise<LlmOutputEvent | null> {
    if (!this.lastTranscript) {
      this.logger.info("No transcript available yet.");
      await this.bus.publish(Topics.Status, "No transcript available yet.");
      return null;
    }
    return this.sendPrompt(this.lastTranscript);
  }

  async sendPrompt(prompt: string): Promise<LlmOutputEvent | null> {
    const trimmed = prompt.trim();
    if (!trimmed) return null;

    const providerId = this.activeProviderId;
    const section = sectionFor(providerId, this.settings.current()) ?? this.settings.current().openaiCompat;
    const model = section.model.trim();
    const temperature = section.temperature;
    const provider = this.providers.get(providerId);

    let text: string;
    if (provider) {
      this.logger.info(`> [${providerId}:${model} | t=${temperature.toFixed(2)}] ${trimmed}`);
      const response = await provider.generate(trimmed, model, temperature);
      text = response.text;
      this.lastTranscript = trimmed;
    } else {
      text = `[error] provider not found: ${providerId}`;
    }

    const event: LlmOutputEvent = { providerId, model, temperature, prompt: trimmed, text };
    await this.bus.publish(Topics.LlmOutput, event);
    return event;
  }

  providerSettings(providerId: string): ProviderSettingsView {
    const section = sectionFor(providerId, this.settings.current());
    if (!section) {
      throw new Error(`No settings for LLM provider: ${providerId}`);
    }
    return {
      model: section.model,
      temperature: section.temperature,
      baseUrl: section.baseUrl,
      ...(section.apiKey === undefined ? {} : { hasApiKey: section.apiKey.trim() !== "" }),
    };
  }

  /**
   * Changes one provider setting, persists it and, for the URL and key,
   * reconfigures the live provider. Model and temperature are read per prompt.
   */
  async configureProvider(providerId: string, field: ProviderField, value: string): Promise<void> {
    const provider = this.providers.get(providerId);
    const current = sectionFor(providerId, this.settings.current());
    if (!provider || !current) {
      throw new Error(`Unknown LLM provider: ${providerId}`);
    }
    if (field === "key" && current.apiKey === undefined) {
      throw new Error(`${provider.displayName} takes no API key.`);
    }
    const trimmed = field === "url" ? value.trim().replace(/\/+$/, "") : value.trim();
    const temperature = field === "temperature" ? parseTemperature(trimmed) : 0;

    await this.persist((settings) => {
      const section = sectionFor(providerId, settings);
      if (!section) return;
      switch (field) {
        case "model":
          section.model = trimmed;
          break;
        case "temperature":
          section.temperature = temperature;
          break;
        case "url":
          section.baseUrl = trimmed;
          break;
        case "key":
          section.apiKey = trimmed;
          break;
      }
    });

    if (field === "url") provider.configure({ baseUrl: trimmed });
    if (field === "key") provider.configure({ apiKey: trimmed });
    this.logger.info(`Updated ${providerId} ${field}`);
  }

  /** Connects to `address`, or to the last known address when omitted. */
  async connectDevice(address?: string): Promise<ConnectedSession> {
    const target = (address ?? this.settings.current().lastBleAddress).trim();
    const session = await this.device.connect(target);
    await this.persist((settings) => {
      settings.lastBleAddress = session.address;
    });
    return session;
  }

  /** Subscribes to `characteristicId` and remembers it for the next start. */
  async subscribe(characteristicId?: string): Promise<string> {
    const target = (characteristicId ?? this.settings.current().notifyCharacteristic).trim();
    if (!target) {
      throw new Error("No notify characteristic configured.");
    }
    await this.device.subscribeNotify(target);
    await this.persist((settings) => {
      settings.notifyCharacteristic = target;
    });
    return target;
  }

  private async persist(change: (settings: AppSettings) => void): Promise<void> {
    try {
      await this.settings.update(change);
    } catch (err) {
      this.logger.warn("Saving settings failed", { error: describeError(err) });
    }
  }
}
