import type { Detector } from "../../domain/detection/Detector";
import type { Keyword } from "../../domain/keywords/Keyword";

export interface DetectorFactoryPort {
  /**
   * Loads a detector for `keyword`. Rejects with `DetectorBuildError`.
   * Loading is blocking native work; never call this while holding a lock
   * that other sessions wait on.
   */
  build(keyword: Keyword, sensitivity: number, accessKey: string): Promise<Detector>;
}
