import dgram from 'node:dgram';
import { isIPv6 } from 'node:net';
import { scoped } from '../logging.js';
import { EndpointSchema, type Endpoint } from '../types/config.js';
import type { OscInput, OscPacket } from '../types/osc.js';
import { message } from './arguments.js';
import { EncodeError, SendError } from './errors.js';
import { encode, MAX_DATAGRAM_SIZE } from './OscCodec.js';

const log = scoped('osc-client');

/**
 * Encode `packet` and send it as one datagram from a fresh ephemeral socket.
 * Best effort: no retry, no delivery confirmation.
 */
export async function send(endpoint: Endpoint, packet: OscPacket): Promise<void> {
  const bytes = encode(packet);
  if (bytes.length > MAX_DATAGRAM_SIZE) {
    throw new EncodeError(
      `packet of ${bytes.length} bytes exceeds the ${MAX_DATAGRAM_SIZE}-byte datagram limit`,
    );
  }
  const { host, port } = endpoint;
  const socket = dgram.createSocket({ type: isIPv6(host) ? 'udp6' : 'udp4' });
  try {
    await new Promise<void>((resolve, reject) => {
      socket.once('error', reject);
      socket.send(bytes, port, host, (err: Error | null) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
    log.debug({ host, port, bytes: bytes.length }, 'osc send ok');
  } catch (err) {
    log.error({ err, host, port }, 'osc send failed');
    throw new SendError(endpoint, err);
  } finally {
    socket.close();
  }
}

/** Sender bound to one destination endpoint. Stateless; safe to share. */
export class OscClient {
  readonly endpoint: Endpoint;

  constructor(endpoint: Endpoint) {
    this.endpoint = EndpointSchema.parse(endpoint);
  }

  async send(address: string, ...inputs: OscInput[]): Promise<void> {
    if (!address.startsWith('/')) {
      throw new EncodeError(`OSC address must start with '/': ${address}`);
    }
    await send(this.endpoint, message(address, inputs));
  }

  async sendPacket(packet: OscPacket): Promise<void> {
    await send(this.endpoint, packet);
  }
}
