export {
  append,
  type Arguments,
  type ArgumentsKind,
  argumentAt,
  argumentsFrom,
  argumentsToArray,
  first,
  iterateArguments,
  mapArguments,
  NO_ARGS,
  nArgs,
} from "./core/arguments/arguments"
export { materialize } from "./core/bytes/materialize"
export { SharedArena, SharedBytes } from "./core/bytes/shared-bytes"
export {
  type Cmd,
  CommandError,
  type CommandErrorCode,
  type CommandParseResult,
  parseCommand,
} from "./core/command/command"
export { ByteDecoder } from "./core/decoder/byte-decoder"
export {
  anyByte,
  anyBytes,
  byte,
  fail,
  halt,
  lineSafeByte,
  literal,
  succeed,
} from "./core/decoder/primitives"
export { INCOMPLETE, MALFORMED, progress } from "./core/decoder/status"
export {
  type EncodeItem,
  encode,
  encodeInto,
  encodingItems,
  Marker,
  writeItem,
} from "./core/encode/encode"
export { digitCount, encodingLength } from "./core/encode/encoding-length"
export { GrowableBuffer } from "./core/encode/growable-buffer"
export { decodeRequest } from "./core/resp/decode-request"
export {
  bulkString,
  bulkStringArray,
  checkArray,
  checkBulkString,
  sliceArray,
  sliceBulkString,
} from "./core/resp/grammar"
export { parseLength } from "./core/resp/parse-length"
export {
  array,
  data,
  error,
  INT64_MAX,
  INT64_MIN,
  InvalidValueError,
  int,
  isSimpleText,
  nil,
  okay,
  type SimpleText,
  simpleText,
  status,
  type Value,
  type ValueKind,
} from "./core/value/value"
export type {
  DecodeFailure,
  DecodeIncomplete,
  DecodeMalformed,
  DecodeProgress,
  DecodeStatus,
  Decoder,
} from "./ports/decoder"
