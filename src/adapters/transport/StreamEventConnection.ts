import type { Readable, Writable } from "stream";
import type { EventConnectionPort } from "../../ports/transport/EventConnectionPort";
import { isEventData, type EventData, type RawEvent } from "../../domain/protocol/RawEvent";
import { MalformedEventError, TransportWriteError } from "../../domain/errors/errors";

export const PROTOCOL_VERSION = "1.5.4";

const NEWLINE = 0x0a;

interface EventHeader {
  type: string;
  data?: EventData;
  dataLength: number;
  payloadLength: number;
}

/**
 * Framed events over a byte stream: a JSON header line, then `data_length`
 * bytes of JSON data, then `payload_length` bytes of binary payload.
 */
export class StreamEventConnection implements EventConnectionPort {
  private buffer: Buffer = Buffer.alloc(0);
  private ended = false;
  private streamError: Error | null = null;
  private readonly chunks: AsyncIterator<unknown>;

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
    private readonly onClose: () => void = () => undefined
  ) {
    this.chunks = input[Symbol.asyncIterator]();
    // stream errors surface through readEvent/writeEvent, never as an unheard 'error' event
    input.on("error", this.recordError);
    output.on("error", this.recordError);
  }

  private readonly recordError = (err: Error) => {
    if (!this.streamError) this.streamError = err;
  };

  async readEvent(): Promise<RawEvent | null> {
    const headerLine = await this.readLine();
    if (headerLine === null) return null;

    const header = parseHeader(headerLine);
    let data: EventData = { ...(header.data ?? {}) };

    if (header.dataLength > 0) {
      const dataBytes = await this.readExactly(header.dataLength, header.type);
      const extra = parseJson(dataBytes, `${header.type} data`);
      if (!isEventData(extra)) {
        throw new MalformedEventError(`${header.type}: data must be a JSON object`);
      }
      data = { ...data, ...extra };
    }

    const payload =
      header.payloadLength > 0 ? await this.readExactly(header.payloadLength, header.type) : null;

    return { type: header.type, data, payload };
  }

  async writeEvent(event: RawEvent): Promise<void> {
    const header: Record<string, unknown> = { type: event.type, version: PROTOCOL_VERSION };
    const parts: Buffer[] = [];

    const hasData = Object.keys(event.data).length > 0;
    const dataBytes = hasData ? Buffer.from(JSON.stringify(event.data), "utf8") : null;
    if (dataBytes) header.data_length = dataBytes.length;
    if (event.payload && event.payload.length > 0) header.payload_length = event.payload.length;

    parts.push(Buffer.from(`${JSON.stringify(header)}\n`, "utf8"));
    if (dataBytes) parts.push(dataBytes);
    if (event.payload && event.payload.length > 0) parts.push(event.payload);

    await this.write(Buffer.concat(parts));
  }

  async close(): Promise<void> {
    this.onClose();
  }

  private write(bytes: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.streamError) {
        reject(
          new TransportWriteError(`Connection failed: ${this.streamError.message}`, {
            cause: this.streamError,
          })
        );
        return;
      }
      if (this.output.destroyed || this.output.writableEnded) {
        reject(new TransportWriteError("Connection is closed"));
        return;
      }
      this.output.write(bytes, (err) => {
        if (err) {
          reject(new TransportWriteError(`Failed to write event: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  /** Next line without its newline, or null when the stream ended cleanly between events. */
  private async readLine(): Promise<Buffer | null> {
    for (;;) {
      const newline = this.buffer.indexOf(NEWLINE);
      if (newline >= 0) {
        const line = this.buffer.subarray(0, newline);
        this.buffer = this.buffer.subarray(newline + 1);
        return line;
      }
      if (!(await this.fill())) {
        if (this.buffer.length === 0) return null;
        throw new MalformedEventError("Stream ended in the middle of an event header");
      }
    }
  }

  private async readExactly(length: number, type: string): Promise<Buffer> {
    while (this.buffer.length < length) {
      if (!(await this.fill())) {
        throw new MalformedEventError(
          `${type}: stream ended after ${this.buffer.length} of ${length} bytes`
        );
      }
    }
    const bytes = this.buffer.subarray(0, length);
    this.buffer = this.buffer.subarray(length);
    return bytes;
  }

  private async fill(): Promise<boolean> {
    if (this.ended) return false;
    const next = await this.chunks.next();
    if (next.done) {
      this.ended = true;
      return false;
    }
    const chunk: unknown = next.value;
    const bytes = Buffer.isBuffer(chunk)
      ? chunk
      : typeof chunk === "string"
        ? Buffer.from(chunk, "utf8")
        : chunk instanceof Uint8Array
          ? Buffer.from(chunk)
          : Buffer.alloc(0);
    this.buffer = this.buffer.length ? Buffer.concat([this.buffer, bytes]) : bytes;
    return true;
  }
}

function parseHeader(line: Buffer): EventHeader {
  const parsed = parseJson(line, "event header");
  if (!isEventData(parsed) || typeof parsed.type !== "string") {
    throw new MalformedEventError("Event header must be a JSON object with a string type");
  }
  if (parsed.data !== undefined && parsed.data !== null && !isEventData(parsed.data)) {
    throw new MalformedEventError(`${parsed.type}: inline data must be a JSON object`);
  }
  return {
    type: parsed.type,
    data: isEventData(parsed.data) ? parsed.data : undefined,
    dataLength: readLength(parsed, "data_length"),
    payloadLength: readLength(parsed, "payload_length"),
  };
}

function readLength(header: EventData, field: string): number {
  const value = header[field];
  if (value === undefined || value === null) return 0;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new MalformedEventError(`${field} must be a non-negative integer`);
  }
  return value;
}

function parseJson(bytes: Buffer, what: string): unknown {
  try {
    return JSON.parse(bytes.toString("utf8"));
  } catch (err) {
    throw new MalformedEventError(`Invalid JSON in ${what}`, { cause: err });
  }
}
