import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  /** Restores the console and resolves once the log file is flushed. Safe to call twice. */
  shutdown(): Promise<void>;
}

type MirroredLevel = "log" | "debug" | "info" | "warn" | "error";

const MIRRORED_LEVELS: MirroredLevel[] = ["log", "debug", "info", "warn", "error"];

/**
 * Mirrors everything written through `target` into `logFile` (append mode,
 * one timestamped line per call). Without a log file this is a no-op.
 */
export function initializeLogging(logFile: string | undefined, target: Console = console): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: async () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  const startedAt = new Date().toISOString();
  stream.write(`[${startedAt}] --- wake service started ---\n`);

  const original: Record<MirroredLevel, (...args: unknown[]) => void> = {
    log: target.log.bind(target),
    debug: target.debug.bind(target),
    info: target.info.bind(target),
    warn: target.warn.bind(target),
    error: target.error.bind(target),
  };

  const mirror =
    (level: MirroredLevel) =>
    (...args: unknown[]) => {
      original[level](...args);
      const timestamp = new Date().toISOString();
      const message = args.map(formatArg).join(" ");
      stream.write(`[${timestamp}] ${level.toUpperCase()} ${message}\n`);
    };

  for (const level of MIRRORED_LEVELS) {
    target[level] = mirror(level);
  }

  let finished: Promise<void> | null = null;
  const shutdown = () => {
    if (finished) return finished;
    for (const level of MIRRORED_LEVELS) {
      target[level] = original[level];
    }
    const endedAt = new Date().toISOString();
    stream.write(`[${endedAt}] --- wake service stopped ---\n`);
    finished = new Promise<void>((resolve, reject) => {
      stream.once("error", reject);
      stream.end(() => resolve());
    });
    return finished;
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}

function formatArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? `${arg.name}: ${arg.message}`;
  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    return String(arg);
  }
}
