import type { WakeWordPort } from "../../ports/speech/WakeWordPort";

export class Detector {
  constructor(
    private readonly engine: WakeWordPort,
    readonly sensitivity: number
  ) {}

  get frameLength(): number {
    return this.engine.frameLength;
  }

  /** Bytes of 16-bit mono PCM consumed by one `process` call. */
  get frameBytes(): number {
    return this.engine.frameLength * 2;
  }

  process(frame: Int16Array): number {
    return this.engine.process(frame);
  }

  dispose(): void {
    this.engine.dispose();
  }
}
