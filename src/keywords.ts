import fs from "fs";
import path from "path";
import type { LoggerPort } from "./ports/sys/LoggerPort";
import type { Keyword } from "./domain/keywords/Keyword";

export interface DiscoveredKeywords {
  /** language -> `.pv` language model */
  languageModels: Map<string, string>;
  /** keyword name -> keyword; later discoveries replace earlier ones */
  keywords: Map<string, Keyword>;
}

export interface DiscoveryOptions {
  dataDir: string;
  system: string;
  customKeywordDirs: string[];
}

export function discoverKeywords(options: DiscoveryOptions, logger: LoggerPort): DiscoveredKeywords {
  const languageModels = new Map<string, string>();
  for (const modelPath of listFiles(path.join(options.dataDir, "lib", "common"), ".pv", false, logger)) {
    const language = lastToken(stem(modelPath));
    languageModels.set(language, modelPath);
  }

  const keywords = new Map<string, Keyword>();

  // resources/<language>/<system>/<name>_<system>.ppn
  for (const kwPath of listFiles(path.join(options.dataDir, "resources"), ".ppn", true, logger)) {
    const kwStem = stem(kwPath);
    const separator = kwStem.lastIndexOf("_");
    if (separator < 0 || kwStem.slice(separator + 1) !== options.system) continue;

    keywords.set(kwStem.slice(0, separator), {
      name: kwStem.slice(0, separator),
      language: path.basename(path.dirname(path.dirname(kwPath))),
      modelPath: kwPath,
    });
  }

  // custom models are named <name>_<lang>_<system>_<version>.ppn
  for (const dir of options.customKeywordDirs) {
    for (const kwPath of listFiles(dir, ".ppn", false, logger)) {
      const parts = splitLimit(stem(kwPath), "_", 3);
      if (parts.length !== 4) {
        logger.warn(`Incorrect keyword filename (${kwPath}), ignoring`);
        continue;
      }
      const [name, language, system] = parts;
      if (system !== options.system) {
        logger.warn(`Incorrect keyword system (${kwPath}), ignoring`);
        continue;
      }
      keywords.set(name, { name, language, modelPath: kwPath });
    }
  }

  return { languageModels, keywords };
}

/** Splits at most `limit` times; the remainder after the last split is kept whole. */
export function splitLimit(value: string, separator: string, limit: number): string[] {
  const parts: string[] = [];
  let rest = value;
  while (parts.length < limit) {
    const index = rest.indexOf(separator);
    if (index < 0) break;
    parts.push(rest.slice(0, index));
    rest = rest.slice(index + separator.length);
  }
  parts.push(rest);
  return parts;
}

function listFiles(dir: string, extension: string, recursive: boolean, logger: LoggerPort): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    const reason = err instanceof Error && "code" in err ? String(err.code) : String(err);
    logger.debug(`Skipping ${dir}: ${reason}`);
    return [];
  }

  const files: string[] = [];
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (recursive) files.push(...listFiles(fullPath, extension, true, logger));
    } else if (entry.isFile() && path.extname(entry.name) === extension) {
      files.push(fullPath);
    }
  }
  return files;
}

function stem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

function lastToken(value: string): string {
  const parts = value.split("_");
  return parts[parts.length - 1];
}
