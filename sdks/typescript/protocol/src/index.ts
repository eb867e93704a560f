/**
 * @cachewire/protocol
 *
 * Framing codec for the binary protocol spoken between cache clients and
 * nodes, and between nodes.
 *
 * @example
 * ```typescript
 * import { createServer } from 'node:net';
 * import {
 *   BufferPool,
 *   DuplexByteStream,
 *   OpCodes,
 *   OperationTable,
 *   ProtocolCodec,
 *   buildSuccess,
 *   serveConnection,
 * } from '@cachewire/protocol';
 *
 * const codec = new ProtocolCodec({ pool: new BufferPool() });
 * const table = new OperationTable().register(OpCodes.Put, (request) => {
 *   store(request.dmap, request.key, request.value);
 *   return buildSuccess(request);
 * });
 *
 * createServer((socket) => {
 *   serveConnection(new DuplexByteStream(socket), codec, table).catch(() => socket.destroy());
 * }).listen(3320);
 * ```
 */

// Re-export core types for convenience
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
  CodecResult,
} from '@cachewire/core';

export * from './protocol/index.js';

export { BufferPool, ScratchBuffer, type BufferPoolOptions } from './BufferPool.js';
export {
  DEFAULT_MAX_VALUE_SIZE,
  type CodecOptions,
  type CodecContext,
  resolveCodecOptions,
} from './CodecOptions.js';
export { ProtocolCodec } from './ProtocolCodec.js';
export {
  OperationTable,
  serveConnection,
  type Operation,
  type OperationLogger,
} from './OperationTable.js';

export type { ByteStream } from './streams/ByteStream.js';
export { DuplexByteStream, fromWebSocket } from './streams/DuplexByteStream.js';
export { MemoryByteStream } from './streams/MemoryByteStream.js';
