export type {
  OscArgument,
  OscArgumentType,
  OscBundle,
  OscColor,
  OscHandler,
  OscInput,
  OscMessage,
  OscMidi,
  OscPacket,
  OscTimeTag,
  OscValue,
} from './types/osc.js';
export { EndpointSchema, AddressSchema, endpointKey, type Endpoint } from './types/config.js';
export { OscCodec, encode, decode, MAX_DATAGRAM_SIZE } from './gateway/OscCodec.js';
export { matches, isPattern } from './gateway/AddressMatcher.js';
export { Dispatcher, type HandlerBinding } from './gateway/Dispatcher.js';
export { OscServer, type ServerState } from './gateway/OscServer.js';
export { OscClient, send } from './gateway/OscClient.js';
export {
  toArgument,
  toArguments,
  valueOf,
  valuesOf,
  message,
  bundle,
  flattenMessages,
  isOscArgument,
} from './gateway/arguments.js';
export { IMMEDIATE, isImmediate, timeTagFromDate, dateFromTimeTag } from './gateway/TimeTag.js';
export {
  OscError,
  EncodeError,
  DecodeError,
  BindError,
  SendError,
  ServerStateError,
} from './gateway/errors.js';
export {
  Registry,
  waitForShutdown,
  type Outgoing,
  type Producer,
  type StartOptions,
  type StartReport,
} from './server/Registry.js';
export { logger, resolveLogLevel, scoped, type LogLevel } from './logging.js';
