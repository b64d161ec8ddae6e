import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { EventServerPort } from "../../ports/transport/EventServerPort";
import { SocketEventServer, type SocketAddress } from "./SocketEventServer";
import { StdioEventServer } from "./StdioEventServer";

export function parseServerUri(uri: string): "stdio" | SocketAddress {
  if (uri === "stdio://" || uri === "stdio:") {
    return "stdio";
  }

  if (uri.startsWith("unix://")) {
    const socketPath = uri.slice("unix://".length);
    if (!socketPath) {
      throw new Error(`Missing socket path in ${uri}`);
    }
    return { path: socketPath };
  }

  if (uri.startsWith("tcp://")) {
    let parsed: URL;
    try {
      parsed = new URL(uri);
    } catch {
      throw new Error(`Invalid tcp uri: ${uri}`);
    }
    const port = Number.parseInt(parsed.port, 10);
    if (!parsed.hostname || !Number.isInteger(port)) {
      throw new Error(`Expected tcp://host:port, got ${uri}`);
    }
    return { host: parsed.hostname.replace(/^\[|\]$/g, ""), port };
  }

  throw new Error(`Only stdio://, tcp:// and unix:// are supported (got ${uri})`);
}

export function createEventServer(uri: string, logger: LoggerPort): EventServerPort {
  const address = parseServerUri(uri);
  if (address === "stdio") {
    return new StdioEventServer();
  }
  return new SocketEventServer(uri, address, logger);
}
