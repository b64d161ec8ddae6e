import type { EventConnectionPort } from "./EventConnectionPort";

export type ConnectionHandler = (connection: EventConnectionPort) => Promise<void>;

export interface EventServerPort {
  readonly uri: string;
  run(handler: ConnectionHandler): Promise<void>;
  stop(): Promise<void>;
}
