import type { KeywordMap } from "../domain/keywords/Keyword";
import type { Attribution, ServiceInfo } from "../domain/protocol/events";

export const PICOVOICE_ATTRIBUTION: Attribution = {
  name: "Picovoice",
  url: "https://github.com/Picovoice/porcupine",
};

export function buildServiceInfo(keywords: KeywordMap, version: string | null = null): ServiceInfo {
  return {
    wake: [
      {
        name: "porcupine",
        description: "On-device wake word detection powered by deep learning",
        attribution: PICOVOICE_ATTRIBUTION,
        installed: true,
        version,
        models: Array.from(keywords.values()).map((kw) => ({
          name: kw.name,
          description: `${kw.name} (${kw.language})`,
          attribution: PICOVOICE_ATTRIBUTION,
          installed: true,
          languages: [kw.language],
          version,
        })),
      },
    ],
  };
}
