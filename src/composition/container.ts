import { resolveConfigPath } from '../config';
import { AUTO_CONNECT, CONFIG_PATH, DEBUG_MODE, OPENAI_API_KEY, SIMULATE } from '../env';
import { SimpleEventBus } from '../adapters/sys/SimpleEventBus';
import { ConsoleLogger } from '../adapters/sys/ConsoleLogger';
import { JsonSettingsStore } from '../adapters/sys/JsonSettingsStore';
import { SettingsMappingStore } from '../adapters/sys/SettingsMappingStore';
import { NobleTransport } from '../adapters/ble/NobleTransport';
import { SimulatedRingTransport } from '../adapters/ble/SimulatedRingTransport';
import { OpenAiProvider } from '../adapters/llm/OpenAiProvider';
import { OllamaProvider } from '../adapters/llm/OllamaProvider';
import { OpenAiCompatProvider } from '../adapters/llm/OpenAiCompatProvider';
import { MappingTable } from '../domain/mapping/MappingTable';
import type { EventBus } from '../domain/events/EventBus';
import type { BleTransportPort } from '../ports/ble/BleTransportPort';
import { ActionRouter } from '../app/ActionRouter';
import { GestureDispatcher } from '../app/GestureDispatcher';
import { DeviceConnection } from '../app/DeviceConnection';
import { ProviderRegistry } from '../app/ProviderRegistry';
import { ControlPanel } from '../app/ControlPanel';
import { CommandConsole } from '../app/CommandConsole';
import { describeError } from '../shared/errors';

export interface ApplicationInstance {
  readonly bus: EventBus;
  readonly console: CommandConsole;
  readonly configPath: string;
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

export async function buildApplication(): Promise<ApplicationInstance> {
  const root = new ConsoleLogger('ringlink', { debug: DEBUG_MODE });
  const configPath = resolveConfigPath(CONFIG_PATH);
  const settingsStore = new JsonSettingsStore(configPath);
  const settings = settingsStore.current();
  root.info(`Settings file: ${configPath}`);

  const bus = new SimpleEventBus(root.child('bus'));
  const simulated = SIMULATE ? new SimulatedRingTransport() : null;
  const transport: BleTransportPort = simulated ?? new NobleTransport(root.child('noble'));
  const device = new DeviceConnection(transport, bus, root.child('ble'));

  const mappings = new MappingTable(new SettingsMappingStore(settingsStore), root.child('mappings'));
  const router = new ActionRouter(root.child('actions'));
  const dispatcher = new GestureDispatcher(bus, mappings, router);

  const providers = new ProviderRegistry();
  providers.register(new OpenAiProvider(OPENAI_API_KEY || settings.openai.apiKey, settings.openai.baseUrl));
  providers.register(new OllamaProvider(settings.ollama.baseUrl));
  providers.register(new OpenAiCompatProvider(settings.openaiCompat.baseUrl, settings.openaiCompat.apiKey));

  const panel = new ControlPanel(bus, router, providers, settingsStore, device, root.child('panel'));
  panel.registerActions();
  dispatcher.wire();

  const commandConsole = new CommandConsole({ device, mappings, panel, providers, simulated });

  return {
    bus,
    console: commandConsole,
    configPath,
    start: async () => {
      if (simulated) {
        root.info('Simulated ring enabled; use "press single|double|long".');
      }
      const address = settingsStore.current().lastBleAddress;
      if (!AUTO_CONNECT || !address) return;
      try {
        await panel.connectDevice(address);
        if (settingsStore.current().notifyCharacteristic) {
          await panel.subscribe();
        }
      } catch (err) {
        root.warn(`Auto-connect to ${address} failed`, { error: describeError(err) });
      }
    },
    shutdown: async () => {
      dispatcher.unwire();
      await device.close();
      await mappings.whenFlushed();
    },
  };
}
