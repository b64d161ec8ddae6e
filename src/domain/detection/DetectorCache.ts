import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { DetectorFactoryPort } from "../../ports/speech/DetectorFactoryPort";
import type { KeywordMap } from "../keywords/Keyword";
import { UnknownKeywordError } from "../errors/errors";
import { AsyncLock } from "./AsyncLock";
import type { Detector } from "./Detector";

/**
 * Process-wide pool of idle detectors, keyed by keyword name.
 *
 * A detector is owned either by one session or by this pool, never both.
 * The lock covers only the idle-set bookkeeping; building a detector happens
 * outside it so first use of different keywords does not queue behind one
 * model load.
 */
export class DetectorCache {
  private readonly idle = new Map<string, Detector[]>();
  private readonly lock = new AsyncLock();

  constructor(
    private readonly keywords: KeywordMap,
    private readonly factory: DetectorFactoryPort,
    private readonly logger: LoggerPort
  ) {}

  async acquire(keywordName: string, sensitivity: number, accessKey: string): Promise<Detector> {
    const keyword = this.keywords.get(keywordName);
    if (!keyword) {
      throw new UnknownKeywordError(keywordName);
    }

    const cached = await this.lock.runExclusive(() => {
      const detectors = this.idle.get(keywordName);
      if (!detectors) return null;
      // exact match only; a different sensitivity is a miss
      const index = detectors.findIndex((d) => d.sensitivity === sensitivity);
      if (index < 0) return null;
      const [detector] = detectors.splice(index, 1);
      this.logger.debug(`Using detector for ${keywordName} from cache`, {
        remaining: detectors.length,
      });
      return detector;
    });
    if (cached) return cached;

    this.logger.debug(`Loading ${keyword.name} for ${keyword.language}`, { sensitivity });
    return this.factory.build(keyword, sensitivity, accessKey);
  }

  async release(keywordName: string, detector: Detector): Promise<void> {
    await this.lock.runExclusive(() => {
      let detectors = this.idle.get(keywordName);
      if (!detectors) {
        detectors = [];
        this.idle.set(keywordName, detectors);
      }
      detectors.push(detector);
      this.logger.debug(`Detector for ${keywordName} returned to cache`, {
        idle: detectors.length,
      });
    });
  }

  idleCount(keywordName: string): number {
    return this.idle.get(keywordName)?.length ?? 0;
  }

  async disposeAll(): Promise<void> {
    await this.lock.runExclusive(() => {
      for (const [keywordName, detectors] of this.idle) {
        for (const detector of detectors) {
          try {
            detector.dispose();
          } catch (err) {
            this.logger.warn(`Failed to release detector for ${keywordName}`, {
              error: String(err),
            });
          }
        }
      }
      this.idle.clear();
    });
  }
}
