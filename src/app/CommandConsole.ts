import type { SimulatedRingTransport } from "../adapters/ble/SimulatedRingTransport";
import type { MappingTable } from "../domain/mapping/MappingTable";
import { describeError } from "../shared/errors";
import { isProviderField, type ControlPanel } from "./ControlPanel";
import type { DeviceConnection } from "./DeviceConnection";
import { DEFAULT_SCAN_SECONDS } from "./DeviceConnection";
import type { ProviderRegistry } from "./ProviderRegistry";

export interface CommandConsoleDeps {
  device: DeviceConnection;
  mappings: MappingTable;
  panel: ControlPanel;
  providers: ProviderRegistry;
  simulated?: SimulatedRingTransport | null;
}

const HELP = [
  "scan [seconds]               list nearby BLE devices",
  "connect [address]            connect (defaults to the last device)",
  "disconnect                   drop the BLE link",
  "status                       connection, listening and LLM state",
  "gatt                         list services and characteristics",
  "subscribe [uuid]             start notifications (defaults to the saved one)",
  "unsubscribe <uuid>           stop notifications",
  "map list|add|remove|reload   edit trigger -> action mappings",
  "listen                       toggle listening",
  "send <prompt>                send a prompt to the active LLM",
  "resend                       resend the last transcript",
  "llm [id]                     show or select the active LLM",
  "llm show [id]                model, temperature, URL and key state",
  "llm set <id> <field> <value> field: model|temperature|url|key",
  "models                       list models of the active LLM",
  "health [id]                  check an LLM backend",
  "press single|double|long     simulated ring only",
  "quit                         exit",
];

const GESTURES = ["single", "double", "long"] as const;
type Gesture = (typeof GESTURES)[number];

function isGesture(value: string): value is Gesture {
  return GESTURES.some((gesture) => gesture === value);
}

/** Text front end standing in for the desktop window. Never throws. */
export class CommandConsole {
  constructor(private readonly deps: CommandConsoleDeps) {}

  async execute(line: string): Promise<string[]> {
    const [command = "", ...args] = line.trim().split(/\s+/).filter(Boolean);
    try {
      return await this.run(command.toLowerCase(), args);
    } catch (err) {
      return [`error: ${describeError(err)}`];
    }
  }

  private async run(command: string, args: string[]): Promise<string[]> {
    const { device, mappings, panel, providers } = this.deps;
    switch (command) {
      case "":
        return [];
      case "help":
        return HELP;
      case "scan": {
        const seconds = args[0] ? Number(args[0]) : DEFAULT_SCAN_SECONDS;
        if (!Number.isFinite(seconds) || seconds <= 0) {
          return [`error: invalid scan duration "${args[0]}"`];
        }
        const devices = await device.scan(seconds);
        if (!devices.length) return ["No devices found."];
        return devices.map((d) => `${d.address}  ${d.rssi} dBm  ${d.name || "(unnamed)"}`);
      }
      case "connect": {
        const session = await panel.connectDevice(args[0]);
        return [`Connected to ${session.address}`];
      }
      case "disconnect":
        await device.disconnect();
        return ["Disconnected."];
      case "status":
        return [
          `device: ${device.connectionState}${device.address ? ` (${device.address})` : ""}`,
          `notify: ${device.subscriptions().join(", ") || "none"}`,
          `listening: ${panel.isListening ? "on" : "off"}`,
          `llm: ${panel.activeProviderId}`,
        ];
      case "gatt":
        return this.gatt();
      case "subscribe": {
        const uuid = await panel.subscribe(args[0]);
        return [`Subscribed to ${uuid}`];
      }
      case "unsubscribe":
        if (!args[0]) return ["usage: unsubscribe <uuid>"];
        await device.unsubscribeNotify(args[0]);
        return [`Unsubscribed from ${args[0]}`];
      case "map":
        return this.map(mappings, args);
      case "listen":
        return [`Listening: ${panel.toggleListen() ? "ON" : "OFF"}`];
      // Replies arrive on the bus as llm_output events, like gesture-triggered ones.
      case "send": {
        const result = await panel.sendPrompt(args.join(" "));
        return result ? [] : ["usage: send <prompt>"];
      }
      case "resend":
        await panel.sendLastTranscript();
        return [];
      case "llm":
        if (args[0] === "show" || args[0] === "set") return this.llmSettings(panel, args);
        if (args[0]) {
          await panel.selectProvider(args[0]);
          return [`Active LLM: ${args[0]}`];
        }
        return providers
          .listIds()
          .map((id) => `${id === panel.activeProviderId ? "*" : " "} ${id}`);
      case "models": {
        const provider = providers.get(panel.activeProviderId);
        if (!provider) return [`error: provider not found: ${panel.activeProviderId}`];
        const { models, error } = await provider.listModels();
        if (error) return [`error: ${error}`];
        return models.length ? models : ["No models reported."];
      }
      case "health": {
        const id = args[0] ?? panel.activeProviderId;
        const provider = providers.get(id);
        if (!provider) return [`error: provider not found: ${id}`];
        const { ok, message } = await provider.isHealthy();
        if (!ok) return [`${id}: unhealthy (${message})`];
        return [message ? `${id}: ok (${message})` : `${id}: ok`];
      }
      case "press": {
        const gesture = (args[0] ?? "").toLowerCase();
        if (!this.deps.simulated) return ["error: press needs --simulate"];
        if (!isGesture(gesture)) return ["usage: press single|double|long"];
        this.deps.simulated.press(gesture);
        return [];
      }
      default:
        return [`Unknown command "${command}". Type "help".`];
    }
  }

  private async llmSettings(panel: ControlPanel, args: string[]): Promise<string[]> {
    const [sub, id = panel.activeProviderId, field = "", ...rest] = args;
    if (sub === "show") {
      const view = panel.providerSettings(id);
      const lines = [
        `model: ${view.model || "(none)"}`,
        `temperature: ${view.temperature.toFixed(2)}`,
        `url: ${view.baseUrl || "(default)"}`,
      ];
      if (view.hasApiKey !== undefined) lines.push(`key: ${view.hasApiKey ? "set" : "not set"}`);
      return lines;
    }
    if (!isProviderField(field) || (field !== "key" && !rest.length)) {
      return ["usage: llm set <id> model|temperature|url|key <value>"];
    }
    const value = rest.join(" ");
    await panel.configureProvider(id, field, value);
    // Keys are never echoed back.
    return [field === "key" ? `Updated ${id} key.` : `Updated ${id} ${field}: ${value.trim()}`];
  }

  private async gatt(): Promise<string[]> {
    const services = await this.deps.device.listCharacteristics();
    if (!services.length) return ["No services (not connected?)."];
    const lines: string[] = [];
    for (const service of services) {
      lines.push(`service ${service.id}${service.description ? `  ${service.description}` : ""}`);
      for (const c of service.characteristics) {
        const description = c.description ? `  ${c.description}` : "";
        lines.push(`  ${c.id}  [${c.properties.join(", ")}]${description}`);
      }
    }
    return lines;
  }

  private async map(mappings: MappingTable, args: string[]): Promise<string[]> {
    const [sub = "list", action, topic] = args;
    switch (sub) {
      case "list": {
        const rows = mappings.rows();
        return rows.length ? rows.map((row) => `${row.topic} -> ${row.action}`) : ["No mappings."];
      }
      case "add":
        if (!action || !topic) return ["usage: map add <action> <topic>"];
        await mappings.addMapping(action, topic);
        return [`Mapped ${topic} -> ${action}`];
      case "remove":
        if (!action || !topic) return ["usage: map remove <action> <topic>"];
        await mappings.removeMapping(action, topic);
        return [`Removed ${topic} -> ${action}`];
      case "reload":
        await mappings.reload();
        return [`Reloaded ${mappings.rows().length} mapping(s).`];
      default:
        return ["usage: map list|add|remove|reload"];
    }
  }
}
