import { Porcupine } from "@picovoice/porcupine-node";
import type { WakeWordPort } from "../../ports/speech/WakeWordPort";

export interface PorcupineWakeWordOptions {
  accessKey: string;
  /** Built-in keyword name or path to a `.ppn` keyword file. */
  keyword: string;
  sensitivity: number;
  /** Path to the `.pv` language model matching the keyword's language. */
  modelPath?: string;
}

export class PorcupineWakeWord implements WakeWordPort {
  private readonly porcupine: Porcupine;

  constructor(options: PorcupineWakeWordOptions) {
    if (!options.accessKey) {
      throw new Error("Porcupine access key is required");
    }
    this.porcupine = new Porcupine(
      options.accessKey,
      [options.keyword],
      [options.sensitivity],
      options.modelPath,
    );
  }

  get frameLength(): number {
    return this.porcupine.frameLength;
  }

  process(frame: Int16Array): number {
    return this.porcupine.process(frame);
  }

  dispose(): void {
    this.porcupine.release();
  }
}
