import { describe, it, expect, afterEach, vi } from 'vitest';
import { OscClient, send } from '../gateway/OscClient.js';
import { OscServer } from '../gateway/OscServer.js';
import { Dispatcher } from '../gateway/Dispatcher.js';
import { message, valuesOf } from '../gateway/arguments.js';
import { EncodeError, SendError } from '../gateway/errors.js';
import type { OscValue } from '../types/osc.js';

describe('OscClient', () => {
  let server: OscServer | undefined;

  afterEach(async () => {
    await server?.stop();
    server = undefined;
  });

  it('delivers a message as one datagram', async () => {
    const dispatcher = new Dispatcher();
    const received: OscValue[][] = [];
    dispatcher.register('/mixer/*/gain', (_address, args) => {
      received.push(valuesOf(args));
    });
    server = new OscServer({ host: '127.0.0.1', port: 0 }, dispatcher);
    await server.start();
    const port = server.address()?.port ?? 0;

    const client = new OscClient({ host: '127.0.0.1', port });
    await client.send('/mixer/3/gain', 0.75, 'db', true);

    await vi.waitFor(() => expect(received).toHaveLength(1));
    expect(received[0]).toEqual([0.75, 'db', true]);
  });

  it('rejects an address without a leading slash', async () => {
    const client = new OscClient({ host: '127.0.0.1', port: 9 });
    await expect(client.send('mixer')).rejects.toBeInstanceOf(EncodeError);
  });

  it('rejects packets that do not fit in one datagram', async () => {
    const client = new OscClient({ host: '127.0.0.1', port: 9 });
    const huge = message('/blob', [new Uint8Array(70_000)]);
    await expect(client.sendPacket(huge)).rejects.toThrow(/exceeds the 65507-byte datagram limit/);
  });

  it('wraps socket failures in SendError', async () => {
    const err = await send({ host: '127.0.0.1', port: 0 }, message('/x')).then(
      () => undefined,
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(SendError);
  });

  it('validates the endpoint', () => {
    expect(() => new OscClient({ host: '127.0.0.1', port: 70_000 })).toThrow();
  });
});
