/**
 * Fixed 12-byte header shared by requests and responses.
 *
 * Header layout (big-endian, no padding):
 * - [0]     Magic (1 byte, 0xE2 request / 0xE3 response)
 * - [1]     Op (1 byte)
 * - [2-3]   DMapLen (uint16 BE)
 * - [4-5]   KeyLen (uint16 BE)
 * - [6]     ExtraLen (1 byte)
 * - [7]     Status (1 byte)
 * - [8-11]  BodyLen (uint32 BE) = ExtraLen + DMapLen + KeyLen + value length
 * - [12+]   Extra | DMap | Key | Value
 */

import { readUInt16, readUInt32, writeUInt16, writeUInt32 } from './NetworkByteOrder.js';

export const HEADER_SIZE = 12;

/** Largest DMap or key byte length a header can describe. */
export const MAX_FIELD_LENGTH = 0xffff;

/** Largest extra record a header can describe. */
export const MAX_EXTRA_LENGTH = 0xff;

/** Largest body a header can describe. */
export const MAX_BODY_LENGTH = 0xffffffff;

/**
 * Marker bytes identifying a frame as a request or a response.
 */
export const MagicCodes = {
  Request: 0xe2,
  Response: 0xe3,
} as const;

export type MagicCode = (typeof MagicCodes)[keyof typeof MagicCodes];

/**
 * Check if a byte is one of the two recognized magic codes.
 */
export function isMagicCode(value: number): value is MagicCode {
  return value === MagicCodes.Request || value === MagicCodes.Response;
}

/**
 * Decoded header fields. `op` and `status` stay plain numbers: the header
 * layer carries any byte, and dispatch decides what an unknown opcode means.
 */
export interface Header {
  readonly magic: number;
  readonly op: number;
  readonly dmapLen: number;
  readonly keyLen: number;
  readonly extraLen: number;
  readonly status: number;
  readonly bodyLen: number;
}

/**
 * Reads the header fields at `offset`. Does not validate them.
 */
export function readHeader(view: DataView, offset: number): Header {
  return {
    magic: view.getUint8(offset),
    op: view.getUint8(offset + 1),
    dmapLen: readUInt16(view, offset + 2),
    keyLen: readUInt16(view, offset + 4),
    extraLen: view.getUint8(offset + 6),
    status: view.getUint8(offset + 7),
    bodyLen: readUInt32(view, offset + 8),
  };
}

/**
 * Writes the header fields at `offset`.
 */
export function writeHeader(view: DataView, offset: number, header: Header): void {
  view.setUint8(offset, header.magic);
  view.setUint8(offset + 1, header.op);
  writeUInt16(view, offset + 2, header.dmapLen);
  writeUInt16(view, offset + 4, header.keyLen);
  view.setUint8(offset + 6, header.extraLen);
  view.setUint8(offset + 7, header.status);
  writeUInt32(view, offset + 8, header.bodyLen);
}

/**
 * Value length implied by a header. Negative when the declared field lengths
 * exceed the body, which only a corrupt or hostile header produces.
 */
export function valueLength(header: Header): number {
  return header.bodyLen - header.extraLen - header.keyLen - header.dmapLen;
}
