import { describe, it, expect, afterEach, vi } from 'vitest';
import dgram from 'node:dgram';
import { Buffer } from 'node:buffer';
import { OscServer } from '../gateway/OscServer.js';
import { Dispatcher } from '../gateway/Dispatcher.js';
import { encode } from '../gateway/OscCodec.js';
import { bundle, message, valuesOf } from '../gateway/arguments.js';
import { BindError, ServerStateError } from '../gateway/errors.js';

const LOCAL = { host: '127.0.0.1', port: 0 };

async function sendRaw(port: number, data: Uint8Array): Promise<void> {
  const socket = dgram.createSocket('udp4');
  try {
    await new Promise<void>((resolve, reject) => {
      socket.send(data, port, '127.0.0.1', (err) => (err ? reject(err) : resolve()));
    });
  } finally {
    socket.close();
  }
}

function boundPort(server: OscServer): number {
  const addr = server.address();
  if (!addr) throw new Error('server is not running');
  return addr.port;
}

describe('OscServer lifecycle', () => {
  const servers: OscServer[] = [];

  afterEach(async () => {
    await Promise.all(servers.map((s) => s.stop()));
    servers.length = 0;
  });

  it('moves created -> running -> stopped', async () => {
    const server = new OscServer(LOCAL);
    servers.push(server);
    expect(server.state).toBe('created');
    expect(server.address()).toBeUndefined();

    await server.start();
    expect(server.state).toBe('running');
    expect(boundPort(server)).toBeGreaterThan(0);

    const stopping = server.stop();
    expect(server.state).toBe('stopping');
    await stopping;
    expect(server.state).toBe('stopped');
    expect(server.address()).toBeUndefined();
  });

  it('treats a second stop as a no-op', async () => {
    const server = new OscServer(LOCAL);
    servers.push(server);
    await server.start();
    await server.stop();
    await expect(server.stop()).resolves.toBeUndefined();
    expect(server.state).toBe('stopped');
  });

  it('refuses to start again after stopping', async () => {
    const server = new OscServer(LOCAL);
    servers.push(server);
    await server.start();
    await server.stop();
    await expect(server.start()).rejects.toBeInstanceOf(ServerStateError);
    expect(server.state).toBe('stopped');
  });

  it('resolves a second start while running', async () => {
    const server = new OscServer(LOCAL);
    servers.push(server);
    await server.start();
    const port = boundPort(server);
    await server.start();
    expect(boundPort(server)).toBe(port);
  });

  it('stops a server that was never started', async () => {
    const server = new OscServer(LOCAL);
    await server.stop();
    expect(server.state).toBe('stopped');
    await expect(server.start()).rejects.toBeInstanceOf(ServerStateError);
  });

  it('fails with BindError when the port is taken', async () => {
    const first = new OscServer(LOCAL);
    servers.push(first);
    await first.start();
    const second = new OscServer({ host: '127.0.0.1', port: boundPort(first) });
    servers.push(second);

    const err = await second.start().then(
      () => undefined,
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(BindError);
    expect(second.state).toBe('stopped');
    expect(first.state).toBe('running');
  });

  it('rejects an invalid endpoint at construction', () => {
    expect(() => new OscServer({ host: '127.0.0.1', port: 70000 })).toThrow();
    expect(() => new OscServer({ host: '', port: 9000 })).toThrow();
  });
});

function captureSocket(): () => dgram.Socket {
  const spy = vi.spyOn(dgram, 'createSocket');
  return () => {
    const result = spy.mock.results[0];
    if (!result || result.type !== 'return') throw new Error('no socket was created');
    return result.value;
  };
}

const REMOTE: dgram.RemoteInfo = { address: '127.0.0.1', family: 'IPv4', port: 1, size: 0 };

describe('OscServer receive loop', () => {
  let server: OscServer | undefined;

  afterEach(async () => {
    vi.restoreAllMocks();
    await server?.stop();
    server = undefined;
  });

  it('drops garbage datagrams and keeps routing well-formed ones', async () => {
    const dispatcher = new Dispatcher();
    const received: Array<{ address: string; values: unknown[] }> = [];
    dispatcher.register('/ok', (address, args) => {
      received.push({ address, values: valuesOf(args) });
    });
    server = new OscServer(LOCAL, dispatcher);
    await server.start();
    const port = boundPort(server);

    await sendRaw(port, Buffer.from([1, 2, 3]));
    await sendRaw(port, Buffer.from('/ok\0,i\0\0\0\x01', 'latin1'));
    await sendRaw(port, encode(message('/ok', ['fine', 7])));

    await vi.waitFor(() => expect(received).toHaveLength(1));
    expect(received[0]).toEqual({ address: '/ok', values: ['fine', 7] });
    expect(server.state).toBe('running');
  });

  it('ignores datagrams that arrive once stop() has begun', async () => {
    const socketOf = captureSocket();
    const dispatcher = new Dispatcher();
    const route = vi.spyOn(dispatcher, 'route');
    server = new OscServer(LOCAL, dispatcher);
    await server.start();
    const socket = socketOf();

    const stopping = server.stop();
    socket.emit('message', encode(message('/late')), REMOTE);
    await stopping;

    expect(route).not.toHaveBeenCalled();
    expect(server.state).toBe('stopped');
  });

  it('keeps running and routing after a socket error', async () => {
    const socketOf = captureSocket();
    const dispatcher = new Dispatcher();
    const addresses: string[] = [];
    dispatcher.register('/after', (address) => {
      addresses.push(address);
    });
    server = new OscServer(LOCAL, dispatcher);
    await server.start();

    socketOf().emit('error', new Error('simulated ICMP unreachable'));
    expect(server.state).toBe('running');

    await sendRaw(boundPort(server), encode(message('/after')));
    await vi.waitFor(() => expect(addresses).toEqual(['/after']));
  });

  it('routes every message of a bundle in order', async () => {
    const dispatcher = new Dispatcher();
    const addresses: string[] = [];
    dispatcher.register('/b/*', (address) => {
      addresses.push(address);
    });
    server = new OscServer(LOCAL, dispatcher);
    await server.start();

    const packet = bundle([message('/b/one'), bundle([message('/b/two')]), message('/b/three')]);
    await sendRaw(boundPort(server), encode(packet));

    await vi.waitFor(() => expect(addresses).toHaveLength(3));
    expect(addresses).toEqual(['/b/one', '/b/two', '/b/three']);
  });
});
