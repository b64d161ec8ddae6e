export type EventData = Record<string, unknown>;

/** One framed event as it travels over the wire, before interpretation. */
export interface RawEvent {
  type: string;
  data: EventData;
  payload: Buffer | null;
}

export function isEventData(value: unknown): value is EventData {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
