import net from 'net';
import os from 'os';
import path from 'path';
import { SocketEventServer } from '../../../src/adapters/transport/SocketEventServer';
import { StreamEventConnection } from '../../../src/adapters/transport/StreamEventConnection';
import { PcmConverter } from '../../../src/adapters/audio/PcmConverter';
import { SessionLifecycle } from '../../../src/app/SessionLifecycle';
import { DetectorCache } from '../../../src/domain/detection/DetectorCache';
import type { RawEvent } from '../../../src/domain/protocol/RawEvent';
import { chunkEvent, FakeDetectorFactory, makeKeywords, makeLogger, makeTime, pcm, rawEvent } from '../../helpers/fakes';

async function until(condition: () => boolean) {
  while (!condition()) {
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

function setup() {
  const logger = makeLogger();
  const factory = new FakeDetectorFactory(2);
  const cache = new DetectorCache(makeKeywords('porcupine'), factory, logger);
  const lifecycle = new SessionLifecycle({
    cache,
    info: { wake: [] },
    createConverter: () => new PcmConverter(),
    time: makeTime(1n, 2n, 3n),
    logger,
    options: { sensitivity: 0.5, accessKey: 'test-key' },
  });
  return { logger, factory, cache, lifecycle };
}

async function exchange(socket: net.Socket, events: RawEvent[]): Promise<string[]> {
  const client = new StreamEventConnection(socket, socket);
  for (const event of events) await client.writeEvent(event);
  const replies: string[] = [];
  for (let event = await client.readEvent(); event; event = await client.readEvent()) {
    replies.push(event.type);
  }
  return replies;
}

function connect(options: net.NetConnectOpts): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect(options, () => resolve(socket));
    socket.once('error', reject);
  });
}

const UTTERANCE = [rawEvent('describe'), chunkEvent(pcm(1, 2, 3, 4)), rawEvent('audio-stop')];

describe('SocketEventServer', () => {
  test('serves a session per TCP connection and returns detectors', async () => {
    const { logger, cache, lifecycle } = setup();
    const server = new SocketEventServer('tcp://127.0.0.1:0', { host: '127.0.0.1', port: 0 }, logger);
    const running = server.run(lifecycle.handleConnection);
    await until(() => server.listening);
    const port = server.port;
    if (port === null) throw new Error('server did not bind a port');

    const first = await exchange(await connect({ host: '127.0.0.1', port }), UTTERANCE);
    const second = await exchange(await connect({ host: '127.0.0.1', port }), UTTERANCE);

    expect(first).toEqual(['info', 'not-detected']);
    expect(second).toEqual(['info', 'not-detected']);
    await until(() => lifecycle.activeSessions === 0);
    expect(cache.idleCount('porcupine')).toBe(1);
    expect(logger.info).toHaveBeenCalledWith('Listening on tcp://127.0.0.1:0');

    await server.stop();
    await expect(running).resolves.toBeUndefined();
  });

  test('stop closes open client sockets and ends their sessions', async () => {
    const { logger, factory, cache, lifecycle } = setup();
    const server = new SocketEventServer('tcp://127.0.0.1:0', { host: '127.0.0.1', port: 0 }, logger);
    const running = server.run(lifecycle.handleConnection);
    await until(() => server.listening);
    const port = server.port;
    if (port === null) throw new Error('server did not bind a port');

    const socket = await connect({ host: '127.0.0.1', port });
    const closed = new Promise<void>((resolve) => socket.once('close', () => resolve()));
    socket.on('error', () => undefined);
    const client = new StreamEventConnection(socket, socket);
    await client.writeEvent(chunkEvent(pcm(1, 2)));
    await until(() => factory.built.length === 1);
    expect(lifecycle.activeSessions).toBe(1);

    await server.stop();
    await closed;
    await until(() => lifecycle.activeSessions === 0);

    expect(cache.idleCount('porcupine')).toBe(1);
    expect(server.listening).toBe(false);
    await expect(running).resolves.toBeUndefined();
  });

  test('serves over a Unix domain socket', async () => {
    const { logger, lifecycle } = setup();
    const socketPath = path.join(os.tmpdir(), `wake-test-${process.pid}.sock`);
    const server = new SocketEventServer(`unix://${socketPath}`, { path: socketPath }, logger);
    const running = server.run(lifecycle.handleConnection);
    await until(() => server.listening);

    const replies = await exchange(await connect({ path: socketPath }), [rawEvent('describe'), rawEvent('audio-stop')]);

    expect(replies).toEqual(['info', 'not-detected']);
    await server.stop();
    await running;
  });

  test('a second run is rejected', async () => {
    const { logger, lifecycle } = setup();
    const server = new SocketEventServer('tcp://127.0.0.1:0', { host: '127.0.0.1', port: 0 }, logger);
    const running = server.run(lifecycle.handleConnection);

    await expect(server.run(lifecycle.handleConnection)).rejects.toThrow(
      'Server already running on tcp://127.0.0.1:0'
    );
    await until(() => server.listening);
    await server.stop();
    await running;
  });
});
