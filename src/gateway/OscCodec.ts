import { Buffer } from 'node:buffer';
import type { OscArgument, OscBundle, OscMessage, OscPacket, OscTimeTag } from '../types/osc.js';
import { scoped } from '../logging.js';
import { DecodeError, EncodeError } from './errors.js';
import { isUint32 } from './TimeTag.js';

const log = scoped('osc-codec');

const BUNDLE_MARKER = Buffer.from('#bundle\0', 'latin1');
const HASH = 0x23;
const INT32_MIN = -0x8000_0000;
const INT32_MAX = 0x7fff_ffff;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/** Largest payload a single IPv4 UDP datagram can carry. */
export const MAX_DATAGRAM_SIZE = 65_507;

function padLength(n: number): number {
  return (4 - (n % 4)) % 4;
}

function padToFour(buf: Buffer): Buffer {
  const pad = padLength(buf.length);
  if (pad === 0) return buf;
  return Buffer.concat([buf, Buffer.alloc(pad, 0)]);
}

/** Encode a string as null-terminated, padded to 4-byte boundary. */
function encodeString(s: string): Buffer {
  return padToFour(Buffer.from(s + '\0', 'utf8'));
}

function encodeAddress(address: string): Buffer {
  if (typeof address !== 'string' || !address.startsWith('/')) {
    throw new EncodeError(`OSC address must start with '/': ${String(address)}`);
  }
  if (/[^\x01-\x7f]/.test(address)) {
    throw new EncodeError(`OSC address must be ASCII without NUL: ${JSON.stringify(address)}`);
  }
  return encodeString(address);
}

function uint32(n: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeUInt32BE(n, 0);
  return buf;
}

function encodeTimeTag(tag: OscTimeTag): Buffer {
  if (!isUint32(tag.seconds) || !isUint32(tag.fraction)) {
    throw new EncodeError(`time tag fields must be uint32: ${tag.seconds}.${tag.fraction}`);
  }
  return Buffer.concat([uint32(tag.seconds), uint32(tag.fraction)]);
}

function fourBytes(values: number[], what: string): Buffer {
  for (const v of values) {
    if (!Number.isInteger(v) || v < 0 || v > 255) {
      throw new EncodeError(`${what} components must be integers in 0..255: ${values.join(',')}`);
    }
  }
  return Buffer.from(values);
}

function unsupported(arg: never): EncodeError {
  const type: unknown = typeof arg === 'object' && arg !== null ? Reflect.get(arg, 'type') : arg;
  return new EncodeError(`unsupported argument type: ${String(type)}`);
}

function typeTag(arg: OscArgument): string {
  switch (arg.type) {
    case 'int32':
      return 'i';
    case 'float32':
      return 'f';
    case 'int64':
      return 'h';
    case 'float64':
      return 'd';
    case 'string':
      return 's';
    case 'blob':
      return 'b';
    case 'boolean':
      return arg.value ? 'T' : 'F';
    case 'nil':
      return 'N';
    case 'impulse':
      return 'I';
    case 'char':
      return 'c';
    case 'timetag':
      return 't';
    case 'color':
      return 'r';
    case 'midi':
      return 'm';
    case 'array':
      return `[${arg.value.map(typeTag).join('')}]`;
    default:
      throw unsupported(arg);
  }
}

function encodePayload(arg: OscArgument, out: Buffer[]): void {
  switch (arg.type) {
    case 'int32': {
      if (!Number.isInteger(arg.value) || arg.value < INT32_MIN || arg.value > INT32_MAX) {
        throw new EncodeError(`int32 argument out of range: ${arg.value}`);
      }
      const buf = Buffer.alloc(4);
      buf.writeInt32BE(arg.value, 0);
      out.push(buf);
      return;
    }
    case 'float32': {
      if (typeof arg.value !== 'number') throw new EncodeError('float32 argument must be a number');
      if (!Number.isFinite(arg.value)) {
        throw new EncodeError(`float32 argument must be finite: ${arg.value}`);
      }
      if (!Number.isFinite(Math.fround(arg.value))) {
        throw new EncodeError(`float32 argument out of range: ${arg.value}`);
      }
      const buf = Buffer.alloc(4);
      buf.writeFloatBE(arg.value, 0);
      out.push(buf);
      return;
    }
    case 'int64': {
      if (typeof arg.value !== 'bigint' || arg.value < INT64_MIN || arg.value > INT64_MAX) {
        throw new EncodeError(`int64 argument out of range: ${String(arg.value)}`);
      }
      const buf = Buffer.alloc(8);
      buf.writeBigInt64BE(arg.value, 0);
      out.push(buf);
      return;
    }
    case 'float64': {
      if (typeof arg.value !== 'number') throw new EncodeError('float64 argument must be a number');
      if (!Number.isFinite(arg.value)) {
        throw new EncodeError(`float64 argument must be finite: ${arg.value}`);
      }
      const buf = Buffer.alloc(8);
      buf.writeDoubleBE(arg.value, 0);
      out.push(buf);
      return;
    }
    case 'string':
      if (typeof arg.value !== 'string') throw new EncodeError('string argument must be a string');
      if (arg.value.includes('\0')) {
        throw new EncodeError('string argument must not contain an embedded NUL');
      }
      out.push(encodeString(arg.value));
      return;
    case 'blob': {
      if (!(arg.value instanceof Uint8Array)) {
        throw new EncodeError('blob argument must be a Uint8Array');
      }
      const size = Buffer.alloc(4);
      size.writeInt32BE(arg.value.length, 0);
      out.push(size, padToFour(Buffer.from(arg.value)));
      return;
    }
    case 'boolean':
    case 'nil':
    case 'impulse':
      return;
    case 'char': {
      const chars = typeof arg.value === 'string' ? Array.from(arg.value) : [];
      const code = chars.length === 1 ? chars[0]?.codePointAt(0) : undefined;
      if (code === undefined) {
        throw new EncodeError(`char argument must be a single character: ${String(arg.value)}`);
      }
      out.push(uint32(code));
      return;
    }
    case 'timetag':
      out.push(encodeTimeTag(arg.value));
      return;
    case 'color': {
      const { r, g, b, a } = arg.value;
      out.push(fourBytes([r, g, b, a], 'color'));
      return;
    }
    case 'midi': {
      const { port, status, data1, data2 } = arg.value;
      out.push(fourBytes([port, status, data1, data2], 'midi'));
      return;
    }
    case 'array':
      for (const item of arg.value) encodePayload(item, out);
      return;
    default:
      throw unsupported(arg);
  }
}

function encodeMessage(msg: OscMessage): Buffer {
  const out: Buffer[] = [encodeAddress(msg.address)];
  out.push(encodeString(',' + msg.args.map(typeTag).join('')));
  for (const arg of msg.args) encodePayload(arg, out);
  return Buffer.concat(out);
}

function encodeBundle(bundle: OscBundle): Buffer {
  const out: Buffer[] = [BUNDLE_MARKER, encodeTimeTag(bundle.timeTag)];
  for (const element of bundle.elements) {
    const bytes = encodePacket(element);
    const size = Buffer.alloc(4);
    size.writeInt32BE(bytes.length, 0);
    out.push(size, bytes);
  }
  return Buffer.concat(out);
}

function encodePacket(packet: OscPacket): Buffer {
  switch (packet.kind) {
    case 'message':
      return encodeMessage(packet);
    case 'bundle':
      return encodeBundle(packet);
    default: {
      const kind: unknown =
        typeof packet === 'object' && packet !== null ? Reflect.get(packet, 'kind') : packet;
      throw new EncodeError(`unknown packet kind: ${String(kind)}`);
    }
  }
}

/**
 * Encode a message or bundle into OSC 1.0 binary form.
 * @throws EncodeError on an invalid address, argument or time tag
 */
export function encode(packet: OscPacket): Buffer {
  return encodePacket(packet);
}

class Reader {
  offset = 0;
  private warnedPadding = false;

  constructor(
    private readonly buf: Buffer,
    private readonly base: number,
  ) {}

  peekAll(): Buffer {
    return this.buf;
  }

  remaining(): number {
    return this.buf.length - this.offset;
  }

  fail(message: string, at: number = this.offset): DecodeError {
    return new DecodeError(message, this.base + at);
  }

  need(n: number, what: string): void {
    if (this.offset + n > this.buf.length) throw this.fail(`truncated ${what}`);
  }

  private skipPadding(from: number, to: number, what: string): void {
    if (to > this.buf.length) throw this.fail(`truncated ${what} padding`, from);
    for (let i = from; i < to; i++) {
      if (this.buf[i] !== 0 && !this.warnedPadding) {
        this.warnedPadding = true;
        log.debug({ offset: this.base + i, what }, 'non-zero padding byte ignored');
      }
    }
    this.offset = to;
  }

  readString(what: string): string {
    const start = this.offset;
    const end = this.buf.indexOf(0, start);
    if (end === -1) throw this.fail(`unterminated ${what}`, start);
    const text = this.buf.toString('utf8', start, end);
    const consumed = end + 1 - start;
    this.skipPadding(end + 1, end + 1 + padLength(consumed), what);
    return text;
  }

  readBlob(): Uint8Array {
    const sizeAt = this.offset;
    const size = this.readInt32('blob size');
    if (size < 0) throw this.fail(`negative blob size ${size}`, sizeAt);
    this.need(size, 'blob');
    const bytes = new Uint8Array(this.buf.subarray(this.offset, this.offset + size));
    this.skipPadding(this.offset + size, this.offset + size + padLength(size), 'blob');
    return bytes;
  }

  readInt32(what: string): number {
    this.need(4, what);
    const v = this.buf.readInt32BE(this.offset);
    this.offset += 4;
    return v;
  }

  readUInt32(what: string): number {
    this.need(4, what);
    const v = this.buf.readUInt32BE(this.offset);
    this.offset += 4;
    return v;
  }

  readFloat32(): number {
    this.need(4, 'float32');
    const v = this.buf.readFloatBE(this.offset);
    this.offset += 4;
    return v;
  }

  readFloat64(): number {
    this.need(8, 'float64');
    const v = this.buf.readDoubleBE(this.offset);
    this.offset += 8;
    return v;
  }

  readInt64(): bigint {
    this.need(8, 'int64');
    const v = this.buf.readBigInt64BE(this.offset);
    this.offset += 8;
    return v;
  }

  readBytes(n: number, what: string): number[] {
    this.need(n, what);
    const bytes = Array.from(this.buf.subarray(this.offset, this.offset + n));
    this.offset += n;
    return bytes;
  }

  readTimeTag(): OscTimeTag {
    const seconds = this.readUInt32('time tag');
    const fraction = this.readUInt32('time tag');
    return { seconds, fraction };
  }

  slice(size: number): Reader {
    const sub = new Reader(
      this.buf.subarray(this.offset, this.offset + size),
      this.base + this.offset,
    );
    this.offset += size;
    return sub;
  }
}

function readTagged(reader: Reader, tag: string, tagsAt: number): OscArgument {
  switch (tag) {
    case 'i':
      return { type: 'int32', value: reader.readInt32('int32') };
    case 'f':
      return { type: 'float32', value: reader.readFloat32() };
    case 'h':
      return { type: 'int64', value: reader.readInt64() };
    case 'd':
      return { type: 'float64', value: reader.readFloat64() };
    case 's':
      return { type: 'string', value: reader.readString('string') };
    case 'b':
      return { type: 'blob', value: reader.readBlob() };
    case 'T':
      return { type: 'boolean', value: true };
    case 'F':
      return { type: 'boolean', value: false };
    case 'N':
      return { type: 'nil' };
    case 'I':
      return { type: 'impulse' };
    case 'c': {
      const at = reader.offset;
      const code = reader.readUInt32('char');
      if (code > 0x10ffff) throw reader.fail(`invalid char code point ${code}`, at);
      return { type: 'char', value: String.fromCodePoint(code) };
    }
    case 't':
      return { type: 'timetag', value: reader.readTimeTag() };
    case 'r': {
      const [r = 0, g = 0, b = 0, a = 0] = reader.readBytes(4, 'color');
      return { type: 'color', value: { r, g, b, a } };
    }
    case 'm': {
      const [port = 0, status = 0, data1 = 0, data2 = 0] = reader.readBytes(4, 'midi');
      return { type: 'midi', value: { port, status, data1, data2 } };
    }
    default:
      throw reader.fail(`unknown type tag '${tag}'`, tagsAt);
  }
}

function readArguments(reader: Reader, tags: string, tagsAt: number): OscArgument[] {
  const root: OscArgument[] = [];
  const parents: OscArgument[][] = [];
  let current = root;
  for (const tag of tags.slice(1)) {
    if (tag === '[') {
      const nested: OscArgument[] = [];
      current.push({ type: 'array', value: nested });
      parents.push(current);
      current = nested;
    } else if (tag === ']') {
      const parent = parents.pop();
      if (!parent) throw reader.fail("unbalanced ']' in type tags", tagsAt);
      current = parent;
    } else {
      current.push(readTagged(reader, tag, tagsAt));
    }
  }
  if (parents.length > 0) throw reader.fail("unbalanced '[' in type tags", tagsAt);
  return root;
}

function decodeMessage(reader: Reader): OscMessage {
  const addressAt = reader.offset;
  const address = reader.readString('address');
  if (!address.startsWith('/')) throw reader.fail("address must start with '/'", addressAt);
  // OSC 1.0 allows senders that omit the type tag string entirely.
  if (reader.remaining() === 0) return { kind: 'message', address, args: [] };
  const tagsAt = reader.offset;
  const tags = reader.readString('type tag string');
  if (!tags.startsWith(',')) throw reader.fail("type tag string must start with ','", tagsAt);
  const args = readArguments(reader, tags, tagsAt);
  if (reader.remaining() > 0) {
    log.debug({ address, trailing: reader.remaining() }, 'trailing bytes ignored');
  }
  return { kind: 'message', address, args };
}

function decodeBundle(reader: Reader): OscBundle {
  reader.offset = BUNDLE_MARKER.length;
  const timeTag = reader.readTimeTag();
  const elements: OscPacket[] = [];
  while (reader.remaining() > 0) {
    const sizeAt = reader.offset;
    const size = reader.readInt32('bundle element size');
    if (size < 0) throw reader.fail(`negative bundle element size ${size}`, sizeAt);
    reader.need(size, 'bundle element');
    elements.push(decodeWith(reader.slice(size)));
  }
  return { kind: 'bundle', timeTag, elements };
}

function isBundle(buf: Buffer): boolean {
  return (
    buf.length >= BUNDLE_MARKER.length &&
    buf.subarray(0, BUNDLE_MARKER.length).equals(BUNDLE_MARKER)
  );
}

function decodeWith(reader: Reader): OscPacket {
  if (reader.remaining() === 0) throw reader.fail('empty packet');
  const buf = reader.peekAll();
  if (isBundle(buf)) return decodeBundle(reader);
  if (buf[0] === HASH) throw reader.fail('malformed bundle marker');
  return decodeMessage(reader);
}

/**
 * Decode one datagram into a message or bundle.
 * @throws DecodeError when the data is truncated or malformed
 */
export function decode(data: Uint8Array): OscPacket {
  const buf = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  return decodeWith(new Reader(buf, 0));
}

export const OscCodec = {
  encode,
  decode,
  MAX_DATAGRAM_SIZE,
} as const;
