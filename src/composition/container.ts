import type { ServerConfig } from '../config';
import { discoverKeywords } from '../keywords';
import type { DetectorFactoryPort } from '../ports/speech/DetectorFactoryPort';
import type { TimePort } from '../ports/sys/TimePort';
import type { EventServerPort } from '../ports/transport/EventServerPort';
import { ConsoleLogger } from '../adapters/sys/ConsoleLogger';
import { NodeTime } from '../adapters/sys/NodeTime';
import { PcmConverter } from '../adapters/audio/PcmConverter';
import { PorcupineDetectorFactory } from '../adapters/speech/PorcupineDetectorFactory';
import { createEventServer } from '../adapters/transport/createEventServer';
import { DetectorCache } from '../domain/detection/DetectorCache';
import { buildServiceInfo } from '../app/ServiceInfo';
import { SessionLifecycle } from '../app/SessionLifecycle';

export interface ApplicationInstance {
  readonly uri: string;
  readonly keywordNames: string[];
  /** Serves connections; resolves once the server has stopped. */
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

export interface ApplicationOverrides {
  logger?: ConsoleLogger;
  server?: EventServerPort;
  factory?: DetectorFactoryPort;
  time?: TimePort;
}

export function buildApplication(
  config: ServerConfig,
  overrides: ApplicationOverrides = {},
): ApplicationInstance {
  const logger = overrides.logger ?? new ConsoleLogger();
  const { languageModels, keywords } = discoverKeywords(
    {
      dataDir: config.dataDir,
      system: config.system,
      customKeywordDirs: config.customKeywordDirs,
    },
    logger.child('discovery'),
  );

  const keywordNames = Array.from(keywords.keys());
  logger.info(`Found ${keywords.size} keyword(s)`, {
    keywords: keywordNames,
    languages: Array.from(languageModels.keys()),
  });
  if (!keywords.has(config.defaultKeyword)) {
    logger.warn(
      `Default keyword "${config.defaultKeyword}" was not found; clients must send detect before audio.`,
    );
  }

  const factory = overrides.factory ?? new PorcupineDetectorFactory(languageModels);
  const cache = new DetectorCache(keywords, factory, logger.child('cache'));
  const lifecycle = new SessionLifecycle({
    cache,
    info: buildServiceInfo(keywords),
    createConverter: () => new PcmConverter(),
    time: overrides.time ?? new NodeTime(),
    logger: logger.child('session'),
    options: {
      sensitivity: config.sensitivity,
      accessKey: config.accessKey,
      defaultKeyword: config.defaultKeyword,
    },
  });
  const server = overrides.server ?? createEventServer(config.uri, logger.child('server'));

  let stopped = false;

  return {
    uri: server.uri,
    keywordNames,
    start: async () => {
      logger.info(`Wake word server started with ${server.uri}`);
      await server.run(lifecycle.handleConnection);
    },
    shutdown: async () => {
      if (stopped) return;
      stopped = true;
      await server.stop();
      await lifecycle.drain();
      await cache.disposeAll();
    },
  };
}
