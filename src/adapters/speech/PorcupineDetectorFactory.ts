import type { DetectorFactoryPort } from "../../ports/speech/DetectorFactoryPort";
import type { WakeWordPort } from "../../ports/speech/WakeWordPort";
import type { Keyword, LanguageModelMap } from "../../domain/keywords/Keyword";
import { Detector } from "../../domain/detection/Detector";
import { DetectorBuildError } from "../../domain/errors/errors";
import { PorcupineWakeWord, type PorcupineWakeWordOptions } from "./PorcupineWakeWord";

export type WakeWordEngineLoader = (options: PorcupineWakeWordOptions) => WakeWordPort;

const loadPorcupine: WakeWordEngineLoader = (options) => new PorcupineWakeWord(options);

export class PorcupineDetectorFactory implements DetectorFactoryPort {
  constructor(
    private readonly languageModels: LanguageModelMap,
    private readonly loadEngine: WakeWordEngineLoader = loadPorcupine
  ) {}

  async build(keyword: Keyword, sensitivity: number, accessKey: string): Promise<Detector> {
    if (!accessKey) {
      throw new DetectorBuildError("Porcupine access key is required");
    }
    if (!Number.isFinite(sensitivity) || sensitivity < 0 || sensitivity > 1) {
      throw new DetectorBuildError(`Sensitivity must be between 0 and 1 (got ${sensitivity})`);
    }

    const modelPath = this.languageModels.get(keyword.language);
    if (!modelPath) {
      throw new DetectorBuildError(
        `No language model for ${keyword.language} (needed by keyword ${keyword.name})`
      );
    }

    try {
      const engine = this.loadEngine({
        accessKey,
        keyword: keyword.modelPath,
        sensitivity,
        modelPath,
      });
      return new Detector(engine, sensitivity);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DetectorBuildError(`Failed to load keyword ${keyword.name}: ${reason}`, {
        cause: err,
      });
    }
  }
}
