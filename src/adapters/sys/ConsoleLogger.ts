import type { LogMeta, LoggerPort } from "../../ports/sys/LoggerPort";

type Level = "debug" | "info" | "warn" | "error";

export interface ConsoleLoggerOptions {
  debug?: boolean;
}

export function formatLogLine(scope: string | undefined, message: string, meta?: LogMeta): string {
  const prefixed = scope ? `[${scope}] ${message}` : message;
  return meta && Object.keys(meta).length ? `${prefixed} ${JSON.stringify(meta)}` : prefixed;
}

export class ConsoleLogger implements LoggerPort {
  constructor(
    private readonly scope?: string,
    private readonly options: ConsoleLoggerOptions = {}
  ) {}

  child(scope: string): ConsoleLogger {
    const nested = this.scope ? `${this.scope}.${scope}` : scope;
    return new ConsoleLogger(nested, this.options);
  }

  debug(message: string, meta?: LogMeta): void {
    if (!this.options.debug) return;
    this.log("debug", message, meta);
  }
  info(message: string, meta?: LogMeta): void {
    this.log("info", message, meta);
  }
  warn(message: string, meta?: LogMeta): void {
    this.log("warn", message, meta);
  }
  error(message: string, meta?: LogMeta): void {
    this.log("error", message, meta);
  }

  private log(level: Level, message: string, meta?: LogMeta) {
    const line = formatLogLine(this.scope, message, meta);
    switch (level) {
      case "debug":
        return console.debug(line);
      case "info":
        return console.info(line);
      case "warn":
        return console.warn(line);
      case "error":
        return console.error(line);
    }
  }
}
