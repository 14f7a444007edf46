import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  shutdown(): void;
}

type ConsoleMethod = "log" | "info" | "warn" | "error" | "debug";

const MIRRORED: ConsoleMethod[] = ["log", "info", "warn", "error", "debug"];

function stringifyArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const original: Record<ConsoleMethod, (...args: unknown[]) => void> = {
    log: console.log.bind(console),
    info: console.info.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
    debug: console.debug.bind(console),
  };

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  stream.on("error", (err) => {
    original.error(`Log file ${resolvedLog} is not writable:`, err.message);
  });
  stream.write(`[${new Date().toISOString()}] --- RingLink session started ---\n`);

  const mirror =
    (level: ConsoleMethod) =>
    (...args: unknown[]) => {
      original[level](...args);
      const timestamp = new Date().toISOString();
      const message = args.map(stringifyArg).join(" ");
      stream.write(`[${timestamp}] ${level.toUpperCase()} ${message}\n`);
    };

  for (const level of MIRRORED) {
    console[level] = mirror(level);
  }

  let closed = false;
  const shutdown = () => {
    if (closed) return;
    closed = true;
    for (const level of MIRRORED) {
      console[level] = original[level];
    }
    stream.write(`[${new Date().toISOString()}] --- RingLink session ended ---\n`);
    stream.end();
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
