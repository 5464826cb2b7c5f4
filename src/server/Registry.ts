import { scoped } from '../logging.js';
import { AddressSchema, EndpointSchema, endpointKey, type Endpoint } from '../types/config.js';
import type { OscHandler, OscInput } from '../types/osc.js';
import { Dispatcher, type HandlerBinding } from '../gateway/Dispatcher.js';
import { OscClient } from '../gateway/OscClient.js';
import { OscServer } from '../gateway/OscServer.js';

const log = scoped('registry');

/** What a bound sender's producer returns: an address and one argument or an argument list. */
export type Outgoing = readonly [address: string, payload?: OscInput | readonly OscInput[]];

export type Producer<A extends unknown[]> = (...args: A) => Outgoing | Promise<Outgoing>;

export type StartReport =
  | { endpoint: Endpoint; ok: true; server: OscServer }
  | { endpoint: Endpoint; ok: false; error: unknown };

export type StartOptions = {
  /** Wait for SIGINT/SIGTERM (or `signal`), then stop every server before resolving. */
  blocking?: boolean;
  signal?: AbortSignal;
};

type Entry = {
  endpoint: Endpoint;
  dispatcher: Dispatcher;
  server: OscServer | undefined;
};

function isInputList(payload: Outgoing[1]): payload is readonly OscInput[] {
  return Array.isArray(payload);
}

function payloadArgs(payload: Outgoing[1]): OscInput[] {
  if (payload === undefined) return [];
  if (isInputList(payload)) return [...payload];
  return [payload];
}

/**
 * Receivers and senders declared by the application, grouped by endpoint.
 * Every receiver on the same host:port shares one Dispatcher and one OscServer.
 */
export class Registry {
  private readonly entries = new Map<string, Entry>();

  /**
   * Call `handler` for every message arriving on `endpoint` whose address matches
   * one of `patterns`.
   * @throws Error when no pattern is given or a pattern does not start with '/'
   */
  onReceive(
    endpoint: Endpoint,
    patterns: string | readonly string[],
    handler: OscHandler,
  ): HandlerBinding[] {
    const list = typeof patterns === 'string' ? [patterns] : [...patterns];
    if (list.length === 0) throw new Error('Must specify an address.');
    for (const p of list) AddressSchema.parse(p);
    const entry = this.entryFor(EndpointSchema.parse(endpoint));
    const bindings = list.map((p) => entry.dispatcher.register(p, handler));
    log.debug({ endpoint: endpointKey(entry.endpoint), patterns: list }, 'receiver registered');
    return bindings;
  }

  /**
   * Wrap `producer` so that each call sends its result to `endpoint`.
   * An array payload is sent as the argument list, anything else as a single argument.
   */
  bindSender<A extends unknown[]>(
    endpoint: Endpoint,
    producer: Producer<A>,
  ): (...args: A) => Promise<Outgoing> {
    const client = new OscClient(endpoint);
    return async (...args: A): Promise<Outgoing> => {
      const packet = await producer(...args);
      const [address, payload] = packet;
      log.debug({ address, to: endpointKey(client.endpoint) }, 'sending');
      await client.send(address, ...payloadArgs(payload));
      return packet;
    };
  }

  dispatcherFor(endpoint: Endpoint): Dispatcher | undefined {
    return this.entries.get(endpointKey(endpoint))?.dispatcher;
  }

  endpoints(): Endpoint[] {
    return [...this.entries.values()].map((e) => e.endpoint);
  }

  servers(): OscServer[] {
    const out: OscServer[] = [];
    for (const e of this.entries.values()) if (e.server) out.push(e.server);
    return out;
  }

  /**
   * Start a server for every endpoint that is not already running.
   * A bind failure is logged and reported without preventing the other endpoints from starting.
   */
  async startAll(options: StartOptions = {}): Promise<StartReport[]> {
    const reports = await Promise.all([...this.entries.values()].map((e) => this.startEntry(e)));
    if (options.blocking) {
      await waitForShutdown(options.signal);
      await this.stopAll();
    }
    return reports;
  }

  async stopAll(): Promise<void> {
    await Promise.all(this.servers().map((s) => s.stop()));
  }

  private async startEntry(entry: Entry): Promise<StartReport> {
    const { endpoint } = entry;
    const current = entry.server;
    const server =
      current && (current.state === 'created' || current.state === 'running')
        ? current
        : new OscServer(endpoint, entry.dispatcher);
    entry.server = server;
    try {
      await server.start();
      return { endpoint, ok: true, server };
    } catch (error) {
      log.error({ err: error, endpoint: endpointKey(endpoint) }, 'endpoint failed to start');
      return { endpoint, ok: false, error };
    }
  }

  private entryFor(endpoint: Endpoint): Entry {
    const key = endpointKey(endpoint);
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { endpoint, dispatcher: new Dispatcher(), server: undefined };
      this.entries.set(key, entry);
    }
    return entry;
  }
}

/** Resolves on SIGINT or SIGTERM, or when `signal` aborts. */
export function waitForShutdown(signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    const done = (): void => {
      process.off('SIGINT', done);
      process.off('SIGTERM', done);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    if (signal?.aborted) {
      resolve();
      return;
    }
    process.once('SIGINT', done);
    process.once('SIGTERM', done);
    signal?.addEventListener('abort', done, { once: true });
  });
}
