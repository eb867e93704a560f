/**
 * Write path: serializes a {@link Message} into one frame.
 *
 * Lengths are always derived from the fields themselves; whatever lengths the
 * message's header claims are ignored.
 */

import { InvalidMessageError, MalformedFrameError, ValueTooBigError } from '@cachewire/core';
import { DEFAULT_MAX_VALUE_SIZE, type CodecContext } from '../CodecOptions.js';
import type { ByteStream } from '../streams/ByteStream.js';
import { HEADER_SIZE, MagicCodes, isMagicCode, writeHeader, type Header } from './Header.js';
import { writeExtra } from './Extras.js';
import { deriveHeader, type Message } from './Message.js';
import { viewOf } from './NetworkByteOrder.js';
import { normalizeNetworkError } from './NetworkErrors.js';

const utf8 = new TextEncoder();

interface FrameLayout {
  header: Header;
  dmapBytes: Uint8Array;
  frameLength: number;
}

function layoutFrame(message: Message, maxValueSize: number): FrameLayout {
  const { magic, op, status } = message.header;
  if (!isMagicCode(magic)) {
    throw new InvalidMessageError(magic);
  }
  if (magic === MagicCodes.Response && message.extra !== null) {
    throw new MalformedFrameError('responses carry no extra');
  }
  if (message.value.length > maxValueSize) {
    throw new ValueTooBigError(message.value.length, maxValueSize);
  }

  const dmapBytes = utf8.encode(message.dmap);
  const header = deriveHeader(
    magic,
    op,
    status,
    message.extra,
    dmapBytes.length,
    message.key.length,
    message.value.length
  );

  return { header, dmapBytes, frameLength: HEADER_SIZE + header.bodyLen };
}

function writeFrame(layout: FrameLayout, message: Message, target: Uint8Array): void {
  const view = viewOf(target);
  writeHeader(view, 0, layout.header);

  let offset = HEADER_SIZE;
  if (message.extra !== null) {
    writeExtra(view, offset, message.extra);
    offset += layout.header.extraLen;
  }

  target.set(layout.dmapBytes, offset);
  offset += layout.dmapBytes.length;

  target.set(message.key, offset);
  offset += message.key.length;

  target.set(message.value, offset);
}

/**
 * Serializes a message into a freshly allocated frame.
 * For message-oriented transports that need an owned byte array.
 */
export function encodeFrame(message: Message, maxValueSize: number = DEFAULT_MAX_VALUE_SIZE): Uint8Array {
  const layout = layoutFrame(message, maxValueSize);
  const frame = new Uint8Array(layout.frameLength);
  writeFrame(layout, message, frame);
  return frame;
}

/**
 * Serializes a message into pooled scratch memory and flushes it with a single write.
 * Nothing is written when the message cannot be encoded.
 */
export async function writeMessage(
  message: Message,
  stream: ByteStream,
  context: CodecContext
): Promise<void> {
  const layout = layoutFrame(message, context.maxValueSize);

  const scratch = context.pool.acquire();
  try {
    const frame = scratch.reserve(layout.frameLength);
    writeFrame(layout, message, frame);
    await stream.writeAll(frame);
  } catch (error) {
    throw normalizeNetworkError(error);
  } finally {
    context.pool.release(scratch);
  }
}
