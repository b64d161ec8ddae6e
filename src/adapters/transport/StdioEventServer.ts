import type { Readable, Writable } from "stream";
import type { ConnectionHandler, EventServerPort } from "../../ports/transport/EventServerPort";
import { StreamEventConnection } from "./StreamEventConnection";

/** Serves exactly one connection on the process's stdin/stdout. */
export class StdioEventServer implements EventServerPort {
  readonly uri = "stdio://";

  constructor(
    private readonly input: Readable = process.stdin,
    private readonly output: Writable = process.stdout
  ) {}

  async run(handler: ConnectionHandler): Promise<void> {
    const connection = new StreamEventConnection(this.input, this.output);
    await handler(connection);
  }

  async stop(): Promise<void> {
    this.input.destroy();
  }
}
