// ============================================================================
// @structpack/core — Public API
// ============================================================================

// High-level API
export { MessagePackEncoder, encode } from './message_pack_encoder.js';
export type { EncoderOptions, ResolvedEncoderOptions } from './config.js';
export { resolveOptions, DEFAULT_MAX_DEPTH } from './config.js';

// Value description protocol
export { isEncodable } from './protocol.js';
export type {
  CodingKey,
  Encodable,
  Encoder,
  MappingContainer,
  SequenceContainer,
  SingleValueContainer,
} from './protocol.js';
export { SUPER, formatPath } from './coding_path.js';
export type { PathSegment } from './coding_path.js';

// Date strategies
export {
  custom,
  deferred,
  formatter,
  iso8601,
  millisecondsSince1970,
  secondsSince1970,
} from './date_strategy.js';
export type {
  DateEncodingKind,
  DateEncodingStrategy,
  DateFormatter,
  DateTransform,
  DateTransformContext,
} from './date_strategy.js';

// Canonical values
export {
  array,
  binary,
  bool,
  count,
  describeValue,
  double,
  equals,
  extended,
  float,
  int,
  integer,
  keyIdentity,
  lookup,
  map,
  nil,
  string,
  uint,
  INT64_MAX,
  INT64_MIN,
  UINT64_MAX,
} from './value.js';
export type { MessagePackEntry, MessagePackKind, MessagePackValue } from './value.js';

// Wire format
export { pack, FORMAT } from './pack.js';
export { unpack, unpackAll } from './unpack.js';
export type { UnpackResult } from './unpack.js';

// Errors
export {
  StructPackError,
  EncodingError,
  EncoderUsageError,
  MessagePackDecodeError,
  ConfigurationError,
} from './errors.js';
export type { EncodingErrorReason } from './errors.js';

// Logging
export { onLog, setLogLevel, getLogLevel, isDebugEnabled } from './logger.js';
export type { EntryLevel, LogEntry, LogLevel, LogCallback } from './logger.js';
