import fs from "fs";
import os from "os";
import path from "path";
import { DEFAULT_KEYWORD } from "./app/WakeSession";

export type TargetSystem = "linux" | "raspberry-pi" | (string & {});

/** Optional JSON settings file; CLI flags and environment take precedence. */
export interface FileConfig {
  uri?: string;
  dataDir?: string;
  system?: string;
  sensitivity?: number;
  customKeywordDirs?: string[];
  defaultKeyword?: string;
}

export interface CliSettings {
  accessKey?: string;
  uri?: string;
  dataDir?: string;
  system?: string;
  sensitivity?: number;
  customKeywordDirs?: readonly string[];
  defaultKeyword?: string;
  debug?: boolean;
}

export interface ServerConfig {
  accessKey: string;
  uri: string;
  dataDir: string;
  system: TargetSystem;
  sensitivity: number;
  customKeywordDirs: string[];
  defaultKeyword: string;
  debug: boolean;
}

export const DEFAULT_SENSITIVITY = 0.5;
export const DEFAULT_URI = "stdio://";

const DEFAULT_CONFIG_FILENAMES = ["wake.config.json"];

export interface LoadedConfig {
  config: FileConfig;
  path?: string;
}

export function loadConfig(configPath?: string): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    const resolved = path.resolve(candidate);
    if (!fs.existsSync(resolved)) continue;
    const raw = fs.readFileSync(resolved, "utf8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Invalid JSON in config file ${resolved}: ${reason}`);
    }
    return { config: normalizeFileConfig(parsed, resolved), path: resolved };
  }

  return { config: {} };
}

export function resolveServerConfig(cli: CliSettings, file: FileConfig = {}): ServerConfig {
  const accessKey = cli.accessKey?.trim();
  if (!accessKey) {
    throw new Error("A Picovoice access key is required (--access-key or PICOVOICE_ACCESS_KEY)");
  }

  const sensitivity = cli.sensitivity ?? file.sensitivity ?? DEFAULT_SENSITIVITY;
  if (!Number.isFinite(sensitivity) || sensitivity < 0 || sensitivity > 1) {
    throw new Error(`Sensitivity must be a number between 0 and 1 (got ${sensitivity})`);
  }

  const dataDir = path.resolve(cli.dataDir ?? file.dataDir ?? path.join(process.cwd(), "data"));
  // the bundled custom_models directory is always scanned first
  const customKeywordDirs = [
    path.join(dataDir, "custom_models"),
    ...(file.customKeywordDirs ?? []),
    ...(cli.customKeywordDirs ?? []),
  ].map((dir) => path.resolve(dir));

  return {
    accessKey,
    uri: cli.uri ?? file.uri ?? DEFAULT_URI,
    dataDir,
    system: cli.system ?? file.system ?? detectSystem(),
    sensitivity,
    customKeywordDirs: Array.from(new Set(customKeywordDirs)),
    defaultKeyword: cli.defaultKeyword ?? file.defaultKeyword ?? DEFAULT_KEYWORD,
    debug: cli.debug ?? false,
  };
}

export function detectSystem(machine: string = os.machine()): TargetSystem {
  const normalized = machine.toLowerCase();
  if (normalized.includes("arm") || normalized.includes("aarch")) {
    return "raspberry-pi";
  }
  return "linux";
}

function normalizeFileConfig(input: unknown, source: string): FileConfig {
  if (!isRecord(input)) {
    throw new Error(`Config file ${source} must contain a JSON object`);
  }
  const out: FileConfig = {};
  const record = input;

  for (const key of ["uri", "dataDir", "system", "defaultKeyword"] as const) {
    const value = record[key];
    if (value === undefined) continue;
    if (typeof value !== "string" || !value.trim()) {
      console.warn(`Ignoring invalid "${key}" in ${source}; expected a non-empty string.`);
      continue;
    }
    out[key] = value.trim();
  }

  if (record.sensitivity !== undefined) {
    if (typeof record.sensitivity === "number") {
      out.sensitivity = record.sensitivity;
    } else {
      console.warn(`Ignoring invalid "sensitivity" in ${source}; expected a number.`);
    }
  }

  if (Array.isArray(record.customKeywordDirs)) {
    out.customKeywordDirs = record.customKeywordDirs
      .filter((dir): dir is string => typeof dir === "string")
      .map((dir) => dir.trim())
      .filter((dir) => dir.length > 0);
  }

  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
