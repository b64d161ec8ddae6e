import { PassThrough } from 'stream';
import { StdioEventServer } from '../../../src/adapters/transport/StdioEventServer';
import type { EventConnectionPort } from '../../../src/ports/transport/EventConnectionPort';

describe('StdioEventServer', () => {
  test('serves a single connection over the given streams', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const server = new StdioEventServer(input, output);
    input.end('{"type":"describe"}\n');

    const handler = jest.fn(async (connection: EventConnectionPort) => {
      const event = await connection.readEvent();
      expect(event).toEqual({ type: 'describe', data: {}, payload: null });
      await expect(connection.readEvent()).resolves.toBeNull();
    });

    await server.run(handler);

    expect(server.uri).toBe('stdio://');
    expect(handler).toHaveBeenCalledTimes(1);
  });

  test('stop destroys the input stream', async () => {
    const input = new PassThrough();
    const server = new StdioEventServer(input, new PassThrough());

    await server.stop();

    expect(input.destroyed).toBe(true);
  });
});
