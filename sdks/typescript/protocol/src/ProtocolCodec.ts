/**
 * Framing codec bound to one configuration and one scratch buffer pool.
 * Stateless apart from the shared pool: any number of concurrent calls, each
 * with its own stream and message, may use the same instance.
 *
 * @example
 * ```typescript
 * const pool = new BufferPool();
 * const codec = new ProtocolCodec({ pool, maxValueSize: 4 * 1024 * 1024 });
 *
 * const stream = new DuplexByteStream(socket);
 * const request = await codec.decode(stream);
 * await codec.encode(buildSuccess(request), stream);
 * ```
 */

import { CodecResult, MalformedFrameError } from '@cachewire/core';
import type { BufferPool } from './BufferPool.js';
import { resolveCodecOptions, type CodecContext, type CodecOptions } from './CodecOptions.js';
import { readMessage } from './protocol/Decoder.js';
import { encodeFrame, writeMessage } from './protocol/Encoder.js';
import type { Message } from './protocol/Message.js';
import type { ByteStream } from './streams/ByteStream.js';
import { MemoryByteStream } from './streams/MemoryByteStream.js';

export class ProtocolCodec {
  private readonly context: CodecContext;

  constructor(options: CodecOptions = {}) {
    this.context = resolveCodecOptions(options);
  }

  get maxValueSize(): number {
    return this.context.maxValueSize;
  }

  get pool(): BufferPool {
    return this.context.pool;
  }

  /**
   * Reads the next complete message from `stream`.
   */
  decode(stream: ByteStream): Promise<Message> {
    return readMessage(stream, this.context);
  }

  /**
   * Writes `message` to `stream` as one frame.
   */
  encode(message: Message, stream: ByteStream): Promise<void> {
    return writeMessage(message, stream, this.context);
  }

  /**
   * Like {@link decode}, with the outcome captured instead of thrown.
   */
  tryDecode(stream: ByteStream): Promise<CodecResult<Message>> {
    return CodecResult.capture(() => this.decode(stream));
  }

  /**
   * Like {@link encode}, with the outcome captured instead of thrown.
   */
  tryEncode(message: Message, stream: ByteStream): Promise<CodecResult<void>> {
    return CodecResult.capture(() => this.encode(message, stream));
  }

  /**
   * Serializes `message` into an owned byte array.
   */
  toBytes(message: Message): Uint8Array {
    return encodeFrame(message, this.context.maxValueSize);
  }

  /**
   * Parses a byte array holding exactly one frame.
   * @throws MalformedFrameError if bytes remain after the frame
   */
  async fromBytes(bytes: Uint8Array): Promise<Message> {
    const stream = new MemoryByteStream(bytes);
    const message = await this.decode(stream);
    if (stream.remaining > 0) {
      throw new MalformedFrameError(`${stream.remaining} trailing bytes after frame`);
    }
    return message;
  }
}
