// OSC data model. Arguments carry their wire type so that encode/decode round-trips losslessly.

/** 64-bit NTP time: seconds since 1900-01-01 and a 2^-32 fraction, both uint32. */
export type OscTimeTag = {
  seconds: number;
  fraction: number;
};

export type OscColor = {
  r: number;
  g: number;
  b: number;
  a: number;
};

export type OscMidi = {
  port: number;
  status: number;
  data1: number;
  data2: number;
};

export type OscArgument =
  | { type: 'int32'; value: number }
  | { type: 'float32'; value: number }
  | { type: 'int64'; value: bigint }
  | { type: 'float64'; value: number }
  | { type: 'string'; value: string }
  | { type: 'blob'; value: Uint8Array }
  | { type: 'boolean'; value: boolean }
  | { type: 'nil' }
  | { type: 'impulse' }
  | { type: 'char'; value: string }
  | { type: 'timetag'; value: OscTimeTag }
  | { type: 'color'; value: OscColor }
  | { type: 'midi'; value: OscMidi }
  | { type: 'array'; value: OscArgument[] };

export type OscArgumentType = OscArgument['type'];

export type OscMessage = {
  kind: 'message';
  address: string;
  args: OscArgument[];
};

export type OscBundle = {
  kind: 'bundle';
  timeTag: OscTimeTag;
  elements: OscPacket[];
};

export type OscPacket = OscMessage | OscBundle;

/** Plain values a sender may hand over instead of typed arguments. */
export type OscInput =
  | OscArgument
  | number
  | bigint
  | string
  | boolean
  | null
  | undefined
  | Uint8Array
  | readonly OscInput[];

/** Unwrapped argument value, as handed to application code by `valueOf`. */
export type OscValue =
  | number
  | bigint
  | string
  | boolean
  | null
  | Uint8Array
  | OscTimeTag
  | OscColor
  | OscMidi
  | OscValue[];

/** Receiver callback. The return value is ignored; rejections are logged. */
export type OscHandler = (address: string, args: OscArgument[]) => void | Promise<void>;
