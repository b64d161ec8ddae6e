import { rmSync } from "fs";
import net from "net";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { ConnectionHandler, EventServerPort } from "../../ports/transport/EventServerPort";
import { StreamEventConnection } from "./StreamEventConnection";

export type SocketAddress = { host: string; port: number } | { path: string };

/** TCP or Unix domain socket server; one connection handler per accepted socket. */
export class SocketEventServer implements EventServerPort {
  private server: net.Server | null = null;
  private readonly sockets = new Set<net.Socket>();

  constructor(
    readonly uri: string,
    private readonly address: SocketAddress,
    private readonly logger: LoggerPort
  ) {}

  run(handler: ConnectionHandler): Promise<void> {
    if (this.server) {
      return Promise.reject(new Error(`Server already running on ${this.uri}`));
    }

    return new Promise<void>((resolve, reject) => {
      const server = net.createServer((socket) => this.accept(socket, handler));
      this.server = server;

      server.once("error", reject);
      server.once("close", () => resolve());
      server.once("listening", () => {
        server.off("error", reject);
        server.on("error", (err) => this.logger.error("Server error", { error: err.message }));
        this.logger.info(`Listening on ${this.uri}`);
      });

      if ("path" in this.address) {
        rmSync(this.address.path, { force: true });
        server.listen(this.address.path);
      } else {
        server.listen(this.address.port, this.address.host);
      }
    });
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  /** Bound TCP port, useful when listening on port 0. */
  get port(): number | null {
    const bound = this.server?.address();
    return bound && typeof bound === "object" ? bound.port : null;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }

  private accept(socket: net.Socket, handler: ConnectionHandler) {
    this.sockets.add(socket);
    socket.on("error", (err) => {
      this.logger.debug("Socket error", { error: err.message });
    });
    socket.once("close", () => {
      this.sockets.delete(socket);
    });

    const connection = new StreamEventConnection(socket, socket, () => socket.end());
    handler(connection).catch((err) => {
      this.logger.error("Connection handler failed", { error: String(err) });
      socket.destroy();
    });
  }
}
