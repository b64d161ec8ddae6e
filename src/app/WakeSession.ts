import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { DetectorCache } from "../domain/detection/DetectorCache";
import type { Detector } from "../domain/detection/Detector";
import type { AudioChunk, InboundEvent, OutboundEvent, ServiceInfo } from "../domain/protocol/events";
import { SessionState } from "../domain/session/SessionState";

export const DEFAULT_KEYWORD = "porcupine";

export type EventSink = (event: OutboundEvent) => Promise<void>;

export interface ChunkConverter {
  convert(chunk: AudioChunk): AudioChunk;
}

export interface WakeSessionOptions {
  sensitivity: number;
  accessKey: string;
  defaultKeyword?: string;
}

/**
 * Protocol state for one client connection.
 *
 * IDLE until a detector is bound (explicit detect or first audio chunk), then
 * ARMED until `disconnect` hands the detector back to the cache.
 */
export class WakeSession {
  private readonly state = new SessionState();
  private detector: Detector | null = null;
  private keywordName = "";
  private audioBuffer: Buffer = Buffer.alloc(0);
  private detected = false;

  constructor(
    readonly clientId: string,
    private readonly cache: DetectorCache,
    private readonly info: ServiceInfo,
    private readonly converter: ChunkConverter,
    private readonly send: EventSink,
    private readonly logger: LoggerPort,
    private readonly options: WakeSessionOptions
  ) {
    this.logger.debug(`Client connected: ${clientId}`);
  }

  get stateValue() {
    return this.state.value;
  }

  get activeKeyword(): string | null {
    return this.detector ? this.keywordName : null;
  }

  get bufferedBytes(): number {
    return this.audioBuffer.length;
  }

  /** Returns false once the utterance is over and the connection should close. */
  async handleEvent(event: InboundEvent): Promise<boolean> {
    switch (event.kind) {
      case "describe":
        await this.send({ kind: "info", info: this.info });
        this.logger.debug(`Sent info to client: ${this.clientId}`);
        return true;

      case "detect":
        if (event.names.length > 0) {
          if (event.names.length > 1) {
            this.logger.debug("Only the first requested keyword is used", {
              clientId: this.clientId,
              names: event.names,
            });
          }
          await this.bindKeyword(event.names[0]);
        }
        return true;

      case "audio-start":
        this.detected = false;
        return true;

      case "audio-chunk":
        await this.processChunk(event.chunk);
        return true;

      case "audio-stop":
        if (!this.detected) {
          await this.send({ kind: "not-detected" });
          this.logger.debug(`Audio stopped without detection from client: ${this.clientId}`);
        }
        return false;

      case "unknown":
        this.logger.debug(`Unexpected event: type=${event.type}`, { data: event.data });
        return true;
    }
  }

  async disconnect(): Promise<void> {
    this.logger.debug(`Client disconnected: ${this.clientId}`);
    await this.releaseDetector();
  }

  private async processChunk(raw: AudioChunk) {
    if (!this.detector) {
      await this.bindKeyword(this.options.defaultKeyword ?? DEFAULT_KEYWORD);
    }
    const detector = this.detector;
    if (!detector) return;

    const chunk = this.converter.convert(raw);
    this.audioBuffer = this.audioBuffer.length
      ? Buffer.concat([this.audioBuffer, chunk.audio])
      : Buffer.from(chunk.audio);

    const frameBytes = detector.frameBytes;
    while (this.audioBuffer.length >= frameBytes) {
      const frame = toInt16Frame(this.audioBuffer, detector.frameLength);
      this.audioBuffer = this.audioBuffer.subarray(frameBytes);

      const keywordIndex = detector.process(frame);
      if (keywordIndex >= 0) {
        this.detected = true;
        this.logger.debug(`Detected ${this.keywordName} from client ${this.clientId}`);
        await this.send({
          kind: "detection",
          name: this.keywordName,
          timestamp: chunk.timestamp,
        });
      }
    }
  }

  private async bindKeyword(keywordName: string) {
    if (this.detector && this.keywordName === keywordName) return;

    // frame length may differ between keywords, so old alignment is meaningless
    await this.releaseDetector();
    this.audioBuffer = Buffer.alloc(0);

    this.detector = await this.cache.acquire(
      keywordName,
      this.options.sensitivity,
      this.options.accessKey
    );
    this.keywordName = keywordName;
    this.state.toArmed();
  }

  private async releaseDetector() {
    const detector = this.detector;
    if (!detector) return;
    this.detector = null;
    this.state.toIdle();
    await this.cache.release(this.keywordName, detector);
  }
}

function toInt16Frame(buffer: Buffer, frameLength: number): Int16Array {
  const frame = new Int16Array(frameLength);
  for (let i = 0; i < frameLength; i++) {
    frame[i] = buffer.readInt16LE(i * 2);
  }
  return frame;
}
