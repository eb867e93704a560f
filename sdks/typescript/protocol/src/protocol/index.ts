/**
 * Wire format layer of the cachewire binary protocol.
 *
 * - Header: the fixed 12-byte header and magic codes
 * - OpCodes / StatusCodes: operation and status enumerations
 * - Extras: opcode-specific extra records and the opcode-to-variant table
 * - Message: message model and constructors
 * - Decoder / Encoder: frame read and write paths
 * - Responses: success and error response builders
 * - NetworkErrors: closed-connection normalization
 */

export {
  HEADER_SIZE,
  MAX_FIELD_LENGTH,
  MAX_EXTRA_LENGTH,
  MAX_BODY_LENGTH,
  MagicCodes,
  type MagicCode,
  type Header,
  isMagicCode,
  readHeader,
  writeHeader,
  valueLength,
} from './Header.js';

export { OpCodes, type OpCode, isOpCode, getOpCodeName } from './OpCodes.js';

export {
  StatusCodes,
  type StatusCode,
  getStatusName,
  isSuccess as isSuccessStatus,
  isError as isErrorStatus,
} from './StatusCodes.js';

export {
  type Extra,
  type ExtraKind,
  type PutWithTtlExtra,
  type LockWithTimeoutExtra,
  type PartitionQueryExtra,
  EXTRA_SIZES,
  extraKindFor,
  extraSize,
  putWithTtl,
  lockWithTimeout,
  partitionQuery,
  assertExtraMatchesOp,
  readExtra,
  writeExtra,
} from './Extras.js';

export {
  type Message,
  type MessageFields,
  createRequest,
  createResponse,
  deriveHeader,
  utf8Length,
  isRequest,
  isResponse,
} from './Message.js';

export {
  writeUInt16,
  writeUInt32,
  writeUInt64,
  writeInt64,
  readUInt16,
  readUInt32,
  readUInt64,
  readInt64,
  viewOf,
} from './NetworkByteOrder.js';

export { readMessage, validateHeader, parseBody } from './Decoder.js';
export { writeMessage, encodeFrame } from './Encoder.js';
export { buildError, buildSuccess } from './Responses.js';
export { normalizeNetworkError, isConnectionClosed } from './NetworkErrors.js';
