import type { Endpoint } from '../types/config.js';

export class OscError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OscError';
  }
}

/** Invalid or unsupported argument, bad address, or a packet too large for one datagram. */
export class EncodeError extends OscError {
  constructor(message: string) {
    super(message);
    this.name = 'EncodeError';
  }
}

export class DecodeError extends OscError {
  constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(`${message} (at byte ${offset})`);
    this.name = 'DecodeError';
  }
}

export class BindError extends OscError {
  constructor(
    public readonly endpoint: Endpoint,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`failed to bind ${endpoint.host}:${endpoint.port}: ${reason}`, { cause });
    this.name = 'BindError';
  }
}

export class SendError extends OscError {
  constructor(
    public readonly endpoint: Endpoint,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`failed to send to ${endpoint.host}:${endpoint.port}: ${reason}`, { cause });
    this.name = 'SendError';
  }
}

export class ServerStateError extends OscError {
  constructor(message: string) {
    super(message);
    this.name = 'ServerStateError';
  }
}
