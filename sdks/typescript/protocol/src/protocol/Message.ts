/**
 * A complete protocol message: header, opcode-specific extra, and the
 * variable-length DMap, key and value fields. The DMap is text; key and
 * value are opaque bytes.
 *
 * Messages are immutable. Every constructor in this package derives the header
 * lengths from the fields, so `bodyLen == extraLen + dmapLen + keyLen + value.length`
 * holds for any message it hands out.
 */

import { MalformedFrameError } from '@cachewire/core';
import {
  MAX_BODY_LENGTH,
  MAX_EXTRA_LENGTH,
  MAX_FIELD_LENGTH,
  MagicCodes,
  type Header,
} from './Header.js';
import { assertExtraMatchesOp, extraSize, type Extra } from './Extras.js';
import type { StatusCode } from './StatusCodes.js';

export interface Message {
  readonly header: Header;

  /** Opcode-specific record, null when the opcode carries none or it was omitted */
  readonly extra: Extra | null;

  /** Map (namespace) name */
  readonly dmap: string;

  /** Key bytes, owned by the message; not necessarily text */
  readonly key: Uint8Array;

  /** Value bytes, owned by the message */
  readonly value: Uint8Array;
}

/**
 * Optional fields when constructing a message. Omitted fields are empty.
 */
export interface MessageFields {
  extra?: Extra | null;
  dmap?: string;
  /** Raw key bytes, or text stored as its UTF-8 encoding */
  key?: Uint8Array | string;
  value?: Uint8Array;
}

const utf8 = new TextEncoder();

/**
 * UTF-8 byte length of a string field.
 */
export function utf8Length(text: string): number {
  return utf8.encode(text).length;
}

/**
 * Computes a header from field sizes, rejecting sizes the header cannot describe.
 */
export function deriveHeader(
  magic: number,
  op: number,
  status: number,
  extra: Extra | null,
  dmapLen: number,
  keyLen: number,
  valueLen: number
): Header {
  assertExtraMatchesOp(op, extra);

  if (dmapLen > MAX_FIELD_LENGTH) {
    throw new MalformedFrameError(`dmap is ${dmapLen} bytes, limit is ${MAX_FIELD_LENGTH}`);
  }
  if (keyLen > MAX_FIELD_LENGTH) {
    throw new MalformedFrameError(`key is ${keyLen} bytes, limit is ${MAX_FIELD_LENGTH}`);
  }

  const extraLen = extraSize(extra);
  if (extraLen > MAX_EXTRA_LENGTH) {
    throw new MalformedFrameError(`extra is ${extraLen} bytes, limit is ${MAX_EXTRA_LENGTH}`);
  }

  const bodyLen = extraLen + dmapLen + keyLen + valueLen;
  if (bodyLen > MAX_BODY_LENGTH) {
    throw new MalformedFrameError(`body is ${bodyLen} bytes, limit is ${MAX_BODY_LENGTH}`);
  }

  return { magic, op, dmapLen, keyLen, extraLen, status, bodyLen };
}

function createMessage(magic: number, op: number, status: number, fields: MessageFields): Message {
  const extra = fields.extra ?? null;
  const dmap = fields.dmap ?? '';
  const key =
    typeof fields.key === 'string' ? utf8.encode(fields.key) : (fields.key ?? new Uint8Array(0));
  const value = fields.value ?? new Uint8Array(0);

  return {
    header: deriveHeader(magic, op, status, extra, utf8Length(dmap), key.length, value.length),
    extra,
    dmap,
    key,
    value,
  };
}

/**
 * Creates a request message.
 */
export function createRequest(op: number, fields: MessageFields = {}): Message {
  return createMessage(MagicCodes.Request, op, 0, fields);
}

/**
 * Creates a response message. Responses carry no extra record.
 */
export function createResponse(
  op: number,
  status: StatusCode | number,
  fields: Omit<MessageFields, 'extra'> = {}
): Message {
  return createMessage(MagicCodes.Response, op, status, fields);
}

/**
 * Returns true if this message is a request.
 */
export function isRequest(message: Message): boolean {
  return message.header.magic === MagicCodes.Request;
}

/**
 * Returns true if this message is a response.
 */
export function isResponse(message: Message): boolean {
  return message.header.magic === MagicCodes.Response;
}
