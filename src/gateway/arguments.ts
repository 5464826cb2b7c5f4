import type {
  OscArgument,
  OscArgumentType,
  OscBundle,
  OscInput,
  OscMessage,
  OscPacket,
  OscTimeTag,
  OscValue,
} from '../types/osc.js';
import { IMMEDIATE } from './TimeTag.js';

const INT32_MIN = -0x8000_0000;
const INT32_MAX = 0x7fff_ffff;

const ARGUMENT_TYPES: ReadonlySet<string> = new Set<OscArgumentType>([
  'int32',
  'float32',
  'int64',
  'float64',
  'string',
  'blob',
  'boolean',
  'nil',
  'impulse',
  'char',
  'timetag',
  'color',
  'midi',
  'array',
]);

function isInputList(input: OscInput): input is readonly OscInput[] {
  return Array.isArray(input);
}

export function isOscArgument(input: unknown): input is OscArgument {
  if (typeof input !== 'object' || input === null) return false;
  if (Array.isArray(input) || input instanceof Uint8Array) return false;
  const type: unknown = Reflect.get(input, 'type');
  return typeof type === 'string' && ARGUMENT_TYPES.has(type);
}

/**
 * Infer a typed argument from a plain value.
 * Integers in int32 range become int32, other safe integers int64, remaining numbers float32
 * (float64 when the value is beyond float32 range).
 */
export function toArgument(input: OscInput): OscArgument {
  if (input === null || input === undefined) return { type: 'nil' };
  if (typeof input === 'number') {
    if (Number.isInteger(input) && input >= INT32_MIN && input <= INT32_MAX) {
      return { type: 'int32', value: input };
    }
    if (Number.isSafeInteger(input)) return { type: 'int64', value: BigInt(input) };
    // float32 overflows to Infinity past ~3.4e38
    if (Number.isFinite(input) && !Number.isFinite(Math.fround(input))) {
      return { type: 'float64', value: input };
    }
    return { type: 'float32', value: input };
  }
  if (typeof input === 'bigint') return { type: 'int64', value: input };
  if (typeof input === 'string') return { type: 'string', value: input };
  if (typeof input === 'boolean') return { type: 'boolean', value: input };
  if (input instanceof Uint8Array) return { type: 'blob', value: input };
  if (isInputList(input)) return { type: 'array', value: input.map(toArgument) };
  return input;
}

export function toArguments(inputs: readonly OscInput[]): OscArgument[] {
  return inputs.map(toArgument);
}

export function valueOf(arg: OscArgument): OscValue {
  switch (arg.type) {
    case 'nil':
    case 'impulse':
      return null;
    case 'array':
      return arg.value.map(valueOf);
    default:
      return arg.value;
  }
}

export function valuesOf(args: readonly OscArgument[]): OscValue[] {
  return args.map(valueOf);
}

export function message(address: string, inputs: readonly OscInput[] = []): OscMessage {
  return { kind: 'message', address, args: toArguments(inputs) };
}

export function bundle(elements: OscPacket[], timeTag: OscTimeTag = IMMEDIATE): OscBundle {
  return { kind: 'bundle', timeTag: { ...timeTag }, elements };
}

/** Messages of a packet in wire order, bundles flattened depth first. */
export function flattenMessages(packet: OscPacket): OscMessage[] {
  if (packet.kind === 'message') return [packet];
  return packet.elements.flatMap(flattenMessages);
}
