import type { LogLevel, LoggerPort } from "../../ports/sys/LoggerPort";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface ConsoleLoggerOptions {
  /** Defaults to the global console. Use a stderr-bound console when stdout carries events. */
  target?: Console;
  minLevel?: LogLevel;
  scope?: string;
}

export class ConsoleLogger implements LoggerPort {
  private readonly target: Console;
  private readonly minLevel: LogLevel;
  private readonly scope?: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.target = options.target ?? console;
    this.minLevel = options.minLevel ?? "debug";
    this.scope = options.scope;
  }

  /** Logger sharing this target and level, prefixing messages with `[scope]`. */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger({
      target: this.target,
      minLevel: this.minLevel,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }
  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }
  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    const scoped = this.scope ? `[${this.scope}] ${message}` : message;
    const payload = meta && Object.keys(meta).length ? `${scoped} ${JSON.stringify(meta)}` : scoped;
    switch (level) {
      case "debug":
        return this.target.debug(payload);
      case "info":
        return this.target.info(payload);
      case "warn":
        return this.target.warn(payload);
      case "error":
        return this.target.error(payload);
    }
  }
}
