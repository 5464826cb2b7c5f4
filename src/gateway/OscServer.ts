import dgram from 'node:dgram';
import { isIPv6 } from 'node:net';
import { scoped } from '../logging.js';
import { EndpointSchema, type Endpoint } from '../types/config.js';
import { flattenMessages } from './arguments.js';
import { Dispatcher } from './Dispatcher.js';
import { BindError, ServerStateError } from './errors.js';
import { decode } from './OscCodec.js';
import type { OscPacket } from '../types/osc.js';

const log = scoped('osc-server');

export type ServerState = 'created' | 'running' | 'stopping' | 'stopped';

/**
 * One UDP socket bound to one endpoint, feeding decoded messages to a Dispatcher.
 * created -> running -> stopping -> stopped; a stopped server cannot be restarted.
 */
export class OscServer {
  readonly endpoint: Endpoint;
  private socket: dgram.Socket | undefined;
  private _state: ServerState = 'created';
  private starting: Promise<void> | undefined;
  private stopping: Promise<void> | undefined;

  constructor(
    endpoint: Endpoint,
    readonly dispatcher: Dispatcher = new Dispatcher(),
  ) {
    this.endpoint = EndpointSchema.parse(endpoint);
  }

  get state(): ServerState {
    return this._state;
  }

  /** Bound address once running; reports the real port when 0 was requested. */
  address(): Endpoint | undefined {
    if (this._state !== 'running' || !this.socket) return undefined;
    const info = this.socket.address();
    return { host: info.address, port: info.port };
  }

  start(): Promise<void> {
    if (this._state === 'running') return Promise.resolve();
    if (this.starting) return this.starting;
    if (this._state !== 'created') {
      return Promise.reject(new ServerStateError(`server ${this.describe()} is ${this._state}`));
    }
    this.starting = this.bind().finally(() => {
      this.starting = undefined;
    });
    return this.starting;
  }

  private bind(): Promise<void> {
    const { host, port } = this.endpoint;
    const socket = dgram.createSocket({ type: isIPv6(host) ? 'udp6' : 'udp4' });
    this.socket = socket;
    return new Promise<void>((resolve, reject) => {
      const onBindError = (err: Error): void => {
        socket.removeListener('listening', onListening);
        this._state = 'stopped';
        this.socket = undefined;
        try {
          socket.close();
        } catch (closeErr) {
          log.debug({ err: closeErr }, 'close after failed bind');
        }
        log.error({ err, host, port }, 'OSC server bind failed');
        reject(new BindError(this.endpoint, err));
      };
      const onListening = (): void => {
        socket.removeListener('error', onBindError);
        socket.on('error', (err) => {
          log.error({ err, host, port }, 'OSC socket error');
        });
        socket.on('message', (data, rinfo) => this.onDatagram(data, rinfo));
        if (this._state === 'created') this._state = 'running';
        log.info({ host, port: socket.address().port }, 'OSC server listening');
        resolve();
      };
      socket.once('error', onBindError);
      socket.once('listening', onListening);
      try {
        socket.bind(port, host);
      } catch (err) {
        onBindError(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  private onDatagram(data: Buffer, rinfo: dgram.RemoteInfo): void {
    if (this._state !== 'running') return;
    let packet: OscPacket;
    try {
      packet = decode(data);
    } catch (err) {
      log.warn(
        { err, from: `${rinfo.address}:${rinfo.port}`, bytes: data.length },
        'dropping malformed datagram',
      );
      return;
    }
    for (const msg of flattenMessages(packet)) {
      log.debug({ address: msg.address, args: msg.args.length }, 'osc message received');
      this.dispatcher.route(msg.address, msg.args);
    }
  }

  /** Close the socket. Safe to call any number of times. */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    if (this._state === 'stopped') return Promise.resolve();
    const socket = this.socket;
    const pending = this.starting;
    this._state = 'stopping';
    this.stopping = (async () => {
      // a bind failure has already been reported to the start() caller
      if (pending) await pending.catch(() => undefined);
      if (socket && this.socket) {
        await new Promise<void>((resolve) => socket.close(() => resolve()));
        log.info({ host: this.endpoint.host, port: this.endpoint.port }, 'OSC server stopped');
      }
      this.socket = undefined;
      this._state = 'stopped';
    })();
    return this.stopping;
  }

  private describe(): string {
    return `${this.endpoint.host}:${this.endpoint.port}`;
  }
}
