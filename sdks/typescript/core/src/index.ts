/**
 * @cachewire/core
 *
 * Error taxonomy and result types shared by the cachewire packages.
 */

export {
  ProtocolErrorCodes,
  type ProtocolErrorCode,
  ProtocolError,
  InvalidMessageError,
  ValueTooBigError,
  MalformedFrameError,
  ConnectionClosedError,
  StreamEndedError,
  isProtocolError,
  toFailureText,
} from './ProtocolErrors.js';

export { CodecResult } from './CodecResult.js';
