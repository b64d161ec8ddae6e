#!/usr/bin/env node
import { Console } from 'console';
import {
  CONFIG_PATH,
  CUSTOM_KEYWORD_DIRS,
  DATA_DIR,
  DEBUG_MODE,
  DEFAULT_KEYWORD_NAME,
  LOG_FILE,
  PICOVOICE_ACCESS_KEY,
  SENSITIVITY,
  SERVER_URI,
  SYSTEM,
} from './env';
import { loadConfig, resolveServerConfig } from './config';
import { buildApplication } from './composition/container';
import { ConsoleLogger } from './adapters/sys/ConsoleLogger';
import { initializeLogging } from './runtime/logging';

// stdout may carry protocol frames, so every log line goes to stderr
const stderrConsole = new Console({ stdout: process.stderr, stderr: process.stderr });

async function main() {
  const loggingHandle = initializeLogging(LOG_FILE, stderrConsole);
  const logger = new ConsoleLogger({
    target: stderrConsole,
    minLevel: DEBUG_MODE ? 'debug' : 'info',
  });
  if (loggingHandle.logPath) {
    logger.info(`Logging output to ${loggingHandle.logPath}`);
  }

  const { config: fileConfig, path: configPath } = loadConfig(CONFIG_PATH);
  if (configPath) {
    logger.info(`Loaded config from ${configPath}`);
  } else if (CONFIG_PATH) {
    logger.warn(`Config file ${CONFIG_PATH} not found; proceeding with defaults.`);
  }

  const config = resolveServerConfig(
    {
      accessKey: PICOVOICE_ACCESS_KEY,
      uri: SERVER_URI,
      dataDir: DATA_DIR,
      system: SYSTEM,
      sensitivity: SENSITIVITY,
      customKeywordDirs: CUSTOM_KEYWORD_DIRS,
      defaultKeyword: DEFAULT_KEYWORD_NAME,
      debug: DEBUG_MODE,
    },
    fileConfig,
  );
  logger.debug('Resolved configuration', {
    uri: config.uri,
    dataDir: config.dataDir,
    system: config.system,
    sensitivity: config.sensitivity,
    customKeywordDirs: config.customKeywordDirs,
  });

  const app = buildApplication(config, { logger });

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    try {
      await app.shutdown();
    } catch (err) {
      logger.warn('Shutdown failed', { error: String(err) });
    }
  };

  process.on('SIGINT', () => {
    logger.info('Exiting…');
    shutdown()
      .then(() => loggingHandle.shutdown())
      .catch((err) => stderrConsole.error(err))
      .finally(() => process.exit(0));
  });

  process.on('exit', () => {
    // only the console restore runs here; the stream cannot flush after exit
    void loggingHandle.shutdown();
  });

  await app.start();
  await shutdown();
  await loggingHandle.shutdown();
}

main().catch((err) => {
  stderrConsole.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
