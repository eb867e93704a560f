/**
 * Read path: turns the next frame of a byte stream into a {@link Message}.
 */

import {
  InvalidMessageError,
  MalformedFrameError,
  ValueTooBigError,
} from '@cachewire/core';
import type { CodecContext } from '../CodecOptions.js';
import type { ByteStream } from '../streams/ByteStream.js';
import { HEADER_SIZE, MagicCodes, isMagicCode, readHeader, valueLength, type Header } from './Header.js';
import { readExtra, type Extra } from './Extras.js';
import type { Message } from './Message.js';
import { viewOf } from './NetworkByteOrder.js';
import { normalizeNetworkError } from './NetworkErrors.js';

// ignoreBOM keeps a leading U+FEFF, so re-encoding yields the same byte length
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

async function readFrom(stream: ByteStream, target: Uint8Array): Promise<void> {
  try {
    await stream.readFull(target);
  } catch (error) {
    throw normalizeNetworkError(error);
  }
}

function decodeText(bytes: Uint8Array, field: string): string {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new MalformedFrameError(`${field} is not valid UTF-8`, { cause: error });
  }
}

/**
 * Checks a header before its body is read. Oversized and inconsistent
 * headers are rejected here so their bodies are never buffered.
 */
export function validateHeader(header: Header, maxValueSize: number): number {
  if (!isMagicCode(header.magic)) {
    throw new InvalidMessageError(header.magic);
  }

  const valueLen = valueLength(header);
  if (valueLen < 0) {
    throw new MalformedFrameError(
      `extra, dmap and key lengths (${header.extraLen} + ${header.dmapLen} + ${header.keyLen}) ` +
        `exceed body length ${header.bodyLen}`
    );
  }
  if (valueLen > maxValueSize) {
    throw new ValueTooBigError(valueLen, maxValueSize);
  }
  return valueLen;
}

/**
 * Splits a frame body into the message fields. `body` may be pooled memory;
 * nothing in the returned message refers to it.
 */
export function parseBody(header: Header, body: Uint8Array, valueLen: number): Message {
  const view = viewOf(body);
  let offset = 0;

  let extra: Extra | null = null;
  if (header.extraLen > 0) {
    if (header.magic !== MagicCodes.Request) {
      throw new MalformedFrameError(`response declares ${header.extraLen} bytes of extra`);
    }
    extra = readExtra(header.op, view, offset, header.extraLen);
    offset += header.extraLen;
  }

  const dmap = decodeText(body.subarray(offset, offset + header.dmapLen), 'dmap');
  offset += header.dmapLen;

  // slice copies: the body is released back to the pool after this call
  const key = body.slice(offset, offset + header.keyLen);
  offset += header.keyLen;

  const value = valueLen === 0 ? new Uint8Array(0) : body.slice(offset, offset + valueLen);

  return { header, extra, dmap, key, value };
}

/**
 * Reads one complete frame. Either resolves with a message satisfying the
 * length invariant or rejects; a partially read frame never yields a message.
 *
 * Rejects with InvalidMessageError, ValueTooBigError, MalformedFrameError,
 * ConnectionClosedError, or the stream's own failure.
 */
export async function readMessage(stream: ByteStream, context: CodecContext): Promise<Message> {
  const scratch = context.pool.acquire();
  try {
    const headerBytes = scratch.reserve(HEADER_SIZE);
    await readFrom(stream, headerBytes);
    const header = readHeader(viewOf(headerBytes), 0);
    const valueLen = validateHeader(header, context.maxValueSize);

    const body = scratch.reserve(header.bodyLen);
    if (body.length > 0) {
      await readFrom(stream, body);
    }
    return parseBody(header, body, valueLen);
  } finally {
    context.pool.release(scratch);
  }
}
