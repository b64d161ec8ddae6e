import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { TimePort } from "../ports/sys/TimePort";
import type { EventConnectionPort } from "../ports/transport/EventConnectionPort";
import type { DetectorCache } from "../domain/detection/DetectorCache";
import { decodeInboundEvent, encodeOutboundEvent, type ServiceInfo } from "../domain/protocol/events";
import { describeError } from "../domain/errors/errors";
import { WakeSession, type ChunkConverter, type WakeSessionOptions } from "./WakeSession";

export interface SessionLifecycleDeps {
  cache: DetectorCache;
  info: ServiceInfo;
  /** Called once per connection; converters hold per-stream state. */
  createConverter: () => ChunkConverter;
  time: TimePort;
  logger: LoggerPort;
  options: WakeSessionOptions;
}

/**
 * Runs one session per connection: read, decode, handle, repeat. Whatever
 * ends the loop, the session's detector goes back to the cache before the
 * connection is closed.
 */
export class SessionLifecycle {
  private lastClientId = 0n;
  private readonly active = new Set<WakeSession>();
  private readonly running = new Set<Promise<void>>();

  constructor(private readonly deps: SessionLifecycleDeps) {}

  get activeSessions(): number {
    return this.active.size;
  }

  readonly handleConnection = (connection: EventConnectionPort): Promise<void> => {
    const run = this.serve(connection);
    this.running.add(run);
    const forget = () => {
      this.running.delete(run);
    };
    void run.then(forget, forget);
    return run;
  };

  /** Resolves once every running session has returned its detector. */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.allSettled(Array.from(this.running));
    }
  }

  private async serve(connection: EventConnectionPort): Promise<void> {
    const { cache, info, createConverter, logger, options } = this.deps;
    const session = new WakeSession(
      this.nextClientId(),
      cache,
      info,
      createConverter(),
      (event) => connection.writeEvent(encodeOutboundEvent(event)),
      logger,
      options
    );
    this.active.add(session);

    try {
      for (;;) {
        const raw = await connection.readEvent();
        if (!raw) break;
        const keepGoing = await session.handleEvent(decodeInboundEvent(raw));
        if (!keepGoing) break;
      }
    } catch (err) {
      logger.error(`Session ${session.clientId} failed: ${describeError(err)}`);
    } finally {
      this.active.delete(session);
      await session.disconnect();
      await connection.close();
    }
  }

  private nextClientId(): string {
    let id = this.deps.time.monotonicNs();
    if (id <= this.lastClientId) {
      id = this.lastClientId + 1n;
    }
    this.lastClientId = id;
    return id.toString();
  }
}
