import type { RawEvent } from "../../domain/protocol/RawEvent";

export interface EventConnectionPort {
  /** Resolves with `null` once the peer has closed the stream. */
  readEvent(): Promise<RawEvent | null>;
  writeEvent(event: RawEvent): Promise<void>;
  close(): Promise<void>;
}
