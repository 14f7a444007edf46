import fs from "fs";
import os from "os";
import path from "path";
import { defaultMappings, normalizeMappings, type MappingData } from "./domain/mapping/MappingTable";
import { isRecord, type JsonRecord } from "./shared/json";

export const APP_NAME = "RingLink";
export const CONFIG_FILE = "config.json";
export const LOG_FILE_NAME = "ringlink.log";

export interface OpenAiSettings {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
}

export interface OllamaSettings {
  baseUrl: string;
  model: string;
  temperature: number;
}

export interface OpenAiCompatSettings {
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature: number;
}

export interface AppSettings {
  openai: OpenAiSettings;
  ollama: OllamaSettings;
  openaiCompat: OpenAiCompatSettings;
  activeProvider: string;
  lastBleAddress: string;
  notifyCharacteristic: string;
  mappings: MappingData;
}

export function defaultSettings(): AppSettings {
  return {
    openai: { apiKey: "", baseUrl: "", model: "gpt-4o-mini", temperature: 0.7 },
    ollama: { baseUrl: "http://127.0.0.1:11434", model: "llama3.1:8b", temperature: 0.7 },
    openaiCompat: { baseUrl: "http://127.0.0.1:8080", apiKey: "", model: "", temperature: 0.7 },
    activeProvider: "openai",
    lastBleAddress: "",
    notifyCharacteristic: "",
    mappings: defaultMappings(),
  };
}

export function getDefaultAppDir(env: NodeJS.ProcessEnv = process.env): string {
  const appData = env.APPDATA;
  if (appData) return path.join(appData, APP_NAME);
  return path.join(os.homedir(), `.${APP_NAME.toLowerCase()}`);
}

export function resolveConfigPath(configPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(configPath ?? path.join(getDefaultAppDir(env), CONFIG_FILE));
}

function pickString(section: JsonRecord, key: string, fallback: string): string {
  const value = section[key];
  return typeof value === "string" ? value : fallback;
}

function pickTemperature(section: JsonRecord, fallback: number): number {
  const value = section.temperature;
  if (typeof value !== "number" || !Number.isFinite(value)) return fallback;
  return Math.min(2, Math.max(0, value));
}

/** Each section falls back to its defaults independently; unknown keys are dropped. */
export function normalizeSettings(raw: unknown): AppSettings {
  const defaults = defaultSettings();
  if (!isRecord(raw)) return defaults;

  const openai = isRecord(raw.openai) ? raw.openai : {};
  const ollama = isRecord(raw.ollama) ? raw.ollama : {};
  const compat = isRecord(raw.openaiCompat) ? raw.openaiCompat : {};

  return {
    openai: {
      apiKey: pickString(openai, "apiKey", defaults.openai.apiKey),
      baseUrl: pickString(openai, "baseUrl", defaults.openai.baseUrl),
      model: pickString(openai, "model", defaults.openai.model),
      temperature: pickTemperature(openai, defaults.openai.temperature),
    },
    ollama: {
      baseUrl: pickString(ollama, "baseUrl", defaults.ollama.baseUrl),
      model: pickString(ollama, "model", defaults.ollama.model),
      temperature: pickTemperature(ollama, defaults.ollama.temperature),
    },
    openaiCompat: {
      baseUrl: pickString(compat, "baseUrl", defaults.openaiCompat.baseUrl),
      apiKey: pickString(compat, "apiKey", defaults.openaiCompat.apiKey),
      model: pickString(compat, "model", defaults.openaiCompat.model),
      temperature: pickTemperature(compat, defaults.openaiCompat.temperature),
    },
    activeProvider: pickString(raw, "activeProvider", defaults.activeProvider),
    lastBleAddress: pickString(raw, "lastBleAddress", defaults.lastBleAddress).trim(),
    notifyCharacteristic: pickString(raw, "notifyCharacteristic", defaults.notifyCharacteristic).trim(),
    mappings: isRecord(raw.mappings) ? normalizeMappings(raw.mappings) : defaults.mappings,
  };
}

export interface LoadedSettings {
  settings: AppSettings;
  path: string;
  /** False when the file was missing or unreadable and defaults were used. */
  fromFile: boolean;
}

export function loadSettings(configPath: string): LoadedSettings {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    return { settings: defaultSettings(), path: resolved, fromFile: false };
  }

  try {
    const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf8"));
    return { settings: normalizeSettings(raw), path: resolved, fromFile: true };
  } catch (err) {
    console.warn(`Failed to load settings from ${resolved}:`, err);
    return { settings: defaultSettings(), path: resolved, fromFile: false };
  }
}

export async function saveSettings(configPath: string, settings: AppSettings): Promise<void> {
  const resolved = path.resolve(configPath);
  await fs.promises.mkdir(path.dirname(resolved), { recursive: true });
  await fs.promises.writeFile(resolved, `${JSON.stringify(settings, null, 2)}\n`, "utf8");
}
