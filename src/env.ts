import { config } from 'dotenv';

config();

export let PICOVOICE_ACCESS_KEY = process.env.PICOVOICE_ACCESS_KEY;
export let SERVER_URI = process.env.WAKE_URI || 'stdio://';
export let DATA_DIR = process.env.WAKE_DATA_DIR;
export let SYSTEM = process.env.WAKE_SYSTEM;
export let SENSITIVITY = parseNumber(process.env.WAKE_SENSITIVITY);
export let DEFAULT_KEYWORD_NAME = process.env.WAKE_DEFAULT_KEYWORD;
export let DEBUG_MODE = process.env.DEBUG_MODE === 'true';

const customKeywordDirArgs: string[] = [];
const cliArgs = process.argv.slice(2);
let configPathArg: string | undefined;
let logFileArg: string | undefined;

for (let i = 0; i < cliArgs.length; i++) {
  const arg = cliArgs[i];
  const next = cliArgs[i + 1];
  switch (arg) {
    case '--uri':
      if (next) SERVER_URI = cliArgs[++i];
      break;
    case '--data-dir':
      if (next) DATA_DIR = cliArgs[++i];
      break;
    case '--system':
      if (next) SYSTEM = cliArgs[++i];
      break;
    case '--sensitivity':
      if (next) SENSITIVITY = parseNumber(cliArgs[++i]);
      break;
    case '--access-key':
      if (next) PICOVOICE_ACCESS_KEY = cliArgs[++i];
      break;
    case '--custom-keyword-dir':
      if (next) customKeywordDirArgs.push(cliArgs[++i]);
      break;
    case '--default-keyword':
      if (next) DEFAULT_KEYWORD_NAME = cliArgs[++i];
      break;
    case '--config':
      if (next) configPathArg = cliArgs[++i];
      break;
    case '--log-file':
      if (next) logFileArg = cliArgs[++i];
      break;
    case '--debug':
      DEBUG_MODE = true;
      break;
    case '--no-debug':
      DEBUG_MODE = false;
      break;
    default:
      break;
  }
}

export const CUSTOM_KEYWORD_DIRS: readonly string[] = customKeywordDirArgs;
export const CONFIG_PATH = configPathArg;
export const LOG_FILE = logFileArg;

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}
