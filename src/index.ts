#!/usr/bin/env node
import path from "path";
import readline from "readline";
import { buildApplication } from "./composition/container";
import { initializeLogging } from "./runtime/logging";
import { CONFIG_PATH, LOG_FILE } from "./env";
import { LOG_FILE_NAME, resolveConfigPath } from "./config";
import { Topics } from "./domain/events/EventBus";
import type { ConnectionStateEvent } from "./domain/device/types";
import type { RawNotifyPayload } from "./domain/gestures/NotificationClassifier";
import type { ListenStateEvent, LlmChangedEvent, LlmOutputEvent } from "./app/ControlPanel";

async function main() {
  const logFile = LOG_FILE ?? path.join(path.dirname(resolveConfigPath(CONFIG_PATH)), LOG_FILE_NAME);
  const loggingHandle = initializeLogging(logFile);
  if (loggingHandle.logPath) {
    console.log(`Logging output to ${loggingHandle.logPath}`);
  }

  const app = await buildApplication();

  app.bus.subscribe<RawNotifyPayload>(Topics.RawNotify, (event) => {
    console.log(`[notify] ${event.uuid} ${event.hexPayload}`);
  });
  app.bus.subscribe<ConnectionStateEvent>(Topics.ConnectionState, (event) => {
    console.log(`[ble] ${event.state}${event.address ? ` ${event.address}` : ""}`);
  });
  app.bus.subscribe<ListenStateEvent>(Topics.ListenState, (event) => {
    console.log(`[listen] ${event.enabled ? "ON" : "OFF"}`);
  });
  app.bus.subscribe<LlmChangedEvent>(Topics.LlmChanged, (event) => {
    console.log(`[llm] active: ${event.providerId}`);
  });
  app.bus.subscribe<LlmOutputEvent>(Topics.LlmOutput, (event) => {
    console.log(`[${event.providerId}:${event.model}] ${event.text}`);
  });
  app.bus.subscribe<string>(Topics.Status, (message) => {
    console.log(`[status] ${message}`);
  });

  await app.start();
  console.log('RingLink ready. Type "help" for commands.');

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    try {
      await app.shutdown();
    } catch (err) {
      console.warn("Shutdown failed:", err);
    }
    loggingHandle.shutdown();
  };

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: "> " });
  let queue: Promise<void> = Promise.resolve();
  rl.on("line", (line) => {
    queue = queue.then(async () => {
      const trimmed = line.trim().toLowerCase();
      if (trimmed === "quit" || trimmed === "exit") {
        rl.close();
        return;
      }
      for (const output of await app.console.execute(line)) {
        console.log(output);
      }
      rl.prompt();
    });
  });
  rl.on("close", () => {
    console.log("\nExiting…");
    void shutdown().finally(() => process.exit(0));
  });
  rl.prompt();

  process.on("SIGINT", () => rl.close());
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
