import { MalformedEventError } from "../errors/errors";
import type { EventData, RawEvent } from "./RawEvent";

export interface AudioFormat {
  rate: number;
  width: number;
  channels: number;
}

export interface AudioChunk extends AudioFormat {
  audio: Buffer;
  timestamp?: number;
}

export type InboundEvent =
  | { kind: "describe" }
  | { kind: "detect"; names: string[] }
  | { kind: "audio-start"; format: AudioFormat; timestamp?: number }
  | { kind: "audio-chunk"; chunk: AudioChunk }
  | { kind: "audio-stop"; timestamp?: number }
  | { kind: "unknown"; type: string; data: EventData };

export interface Attribution {
  name: string;
  url: string;
}

export interface WakeModel {
  name: string;
  description: string;
  attribution: Attribution;
  installed: boolean;
  languages: string[];
  version: string | null;
}

export interface WakeProgram {
  name: string;
  description: string;
  attribution: Attribution;
  installed: boolean;
  version: string | null;
  models: WakeModel[];
}

export interface ServiceInfo {
  wake: WakeProgram[];
}

export type OutboundEvent =
  | { kind: "info"; info: ServiceInfo }
  | { kind: "detection"; name: string; timestamp?: number }
  | { kind: "not-detected" };

export const EventTypes = {
  Describe: "describe",
  Info: "info",
  Detect: "detect",
  Detection: "detection",
  NotDetected: "not-detected",
  AudioStart: "audio-start",
  AudioChunk: "audio-chunk",
  AudioStop: "audio-stop",
} as const;

export function decodeInboundEvent(raw: RawEvent): InboundEvent {
  switch (raw.type) {
    case EventTypes.Describe:
      return { kind: "describe" };
    case EventTypes.Detect:
      return { kind: "detect", names: readNames(raw.data) };
    case EventTypes.AudioStart:
      return {
        kind: "audio-start",
        format: readFormat(raw),
        timestamp: readTimestamp(raw),
      };
    case EventTypes.AudioChunk:
      return {
        kind: "audio-chunk",
        chunk: {
          ...readFormat(raw),
          audio: raw.payload ?? Buffer.alloc(0),
          timestamp: readTimestamp(raw),
        },
      };
    case EventTypes.AudioStop:
      return { kind: "audio-stop", timestamp: readTimestamp(raw) };
    default:
      return { kind: "unknown", type: raw.type, data: raw.data };
  }
}

export function encodeOutboundEvent(event: OutboundEvent): RawEvent {
  switch (event.kind) {
    case "info":
      return {
        type: EventTypes.Info,
        data: {
          asr: [],
          tts: [],
          handle: [],
          intent: [],
          wake: event.info.wake,
        },
        payload: null,
      };
    case "detection": {
      const data: EventData = { name: event.name };
      if (event.timestamp !== undefined) data.timestamp = event.timestamp;
      return { type: EventTypes.Detection, data, payload: null };
    }
    case "not-detected":
      return { type: EventTypes.NotDetected, data: {}, payload: null };
  }
}

function readNames(data: EventData): string[] {
  const names = data.names;
  if (names === undefined || names === null) return [];
  if (!Array.isArray(names) || !names.every((n): n is string => typeof n === "string")) {
    throw new MalformedEventError("detect: names must be a list of strings");
  }
  return names;
}

function readFormat(raw: RawEvent): AudioFormat {
  return {
    rate: readPositiveInt(raw, "rate"),
    width: readPositiveInt(raw, "width"),
    channels: readPositiveInt(raw, "channels"),
  };
}

function readPositiveInt(raw: RawEvent, field: string): number {
  const value = raw.data[field];
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new MalformedEventError(`${raw.type}: ${field} must be a positive integer`);
  }
  return value;
}

function readTimestamp(raw: RawEvent): number | undefined {
  const value = raw.data.timestamp;
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new MalformedEventError(`${raw.type}: timestamp must be a number`);
  }
  return value;
}
