/**
 * End-to-end tests for ProtocolCodec: encode and decode through byte streams.
 */

import { describe, it, expect } from 'vitest';
import { MalformedFrameError, ValueTooBigError } from '@cachewire/core';
import { BufferPool } from '../BufferPool.js';
import { ProtocolCodec } from '../ProtocolCodec.js';
import {
  extraKindFor,
  lockWithTimeout,
  partitionQuery,
  putWithTtl,
  type Extra,
  type ExtraKind,
} from '../protocol/Extras.js';
import { MagicCodes } from '../protocol/Header.js';
import { createRequest, createResponse } from '../protocol/Message.js';
import { OpCodes } from '../protocol/OpCodes.js';
import { buildError } from '../protocol/Responses.js';
import { StatusCodes } from '../protocol/StatusCodes.js';
import { MemoryByteStream } from '../streams/MemoryByteStream.js';

const utf8 = new TextEncoder();

function sampleExtra(kind: ExtraKind): Extra {
  switch (kind) {
    case 'putWithTtl':
      return putWithTtl(60_000n);
    case 'lockWithTimeout':
      return lockWithTimeout(1_500n);
    case 'partitionQuery':
      return partitionQuery(270n);
  }
}

describe('ProtocolCodec', () => {
  describe('get request', () => {
    it('should produce the documented bytes and decode them back', async () => {
      const codec = new ProtocolCodec();
      const msg = createRequest(OpCodes.Get, { dmap: 'users', key: '42' });
      const stream = new MemoryByteStream();

      await codec.encode(msg, stream);
      const bytes = stream.written();

      expect(Array.from(bytes.subarray(0, 12))).toEqual([
        0xe2, 0x02, 0x00, 0x05, 0x00, 0x02, 0x00, 0x00, 0x00, 0x00, 0x00, 0x07,
      ]);
      expect(new TextDecoder().decode(bytes.subarray(12))).toBe('users42');
      expect(await codec.fromBytes(bytes)).toEqual(msg);
    });
  });

  describe('put-with-ttl request', () => {
    it('should recover the TTL exactly', async () => {
      const codec = new ProtocolCodec();
      const msg = createRequest(OpCodes.PutWithTtl, {
        extra: putWithTtl(5000n),
        dmap: 'cache',
        key: 'a',
        value: utf8.encode('v'),
      });

      const bytes = codec.toBytes(msg);
      const decoded = await codec.fromBytes(bytes);

      expect(bytes[6]).toBe(8);
      expect(bytes[11]).toBe(15);
      expect(decoded.header.extraLen).toBe(8);
      expect(decoded.header.bodyLen).toBe(15);
      expect(decoded.extra).toEqual({ kind: 'putWithTtl', ttl: 5000n });
    });
  });

  describe('error response', () => {
    it('should survive the wire with op, status and text intact', async () => {
      const codec = new ProtocolCodec();
      const request = createRequest(OpCodes.Delete, { dmap: 'users', key: 'k' });

      const response = buildError(request, StatusCodes.KeyNotFound, 'not found');
      const decoded = await codec.fromBytes(codec.toBytes(response));

      expect(decoded.header.magic).toBe(MagicCodes.Response);
      expect(decoded.header.op).toBe(OpCodes.Delete);
      expect(decoded.header.status).toBe(StatusCodes.KeyNotFound);
      expect(new TextDecoder().decode(decoded.value)).toBe('not found');
    });
  });

  describe('inconsistent header', () => {
    it('should fail deterministically without reading the body', async () => {
      const codec = new ProtocolCodec();
      const bytes = new Uint8Array([
        0xe2, 0x00, 0x00, 0x10, 0x00, 0x10, 0x08, 0x00, 0x00, 0x00, 0x00, 0x04, 1, 2, 3, 4,
      ]);
      const stream = new MemoryByteStream(bytes);

      await expect(codec.decode(stream)).rejects.toBeInstanceOf(MalformedFrameError);
      expect(stream.remaining).toBe(4);
      expect(codec.pool.getStats()).toEqual({ available: 1, inUse: 0 });
    });
  });

  describe('round trip', () => {
    it('should reproduce every opcode field for field', async () => {
      const codec = new ProtocolCodec();

      for (const op of Object.values(OpCodes)) {
        const kind = extraKindFor(op);
        const msg = createRequest(op, {
          extra: kind === null ? null : sampleExtra(kind),
          dmap: 'sessions',
          key: `key-${op}`,
          value: new Uint8Array([op, 0, 255]),
        });

        expect(await codec.fromBytes(codec.toBytes(msg))).toEqual(msg);
      }
    });

    it('should reproduce responses and multi-byte text', async () => {
      const codec = new ProtocolCodec();
      const msg = createResponse(OpCodes.GetAndPut, StatusCodes.OK, {
        dmap: 'größe',
        key: '﻿clé',
        value: utf8.encode('ancien'),
      });

      expect(await codec.fromBytes(codec.toBytes(msg))).toEqual(msg);
    });

    it('should reproduce a key that is not text', async () => {
      const codec = new ProtocolCodec();
      const msg = createRequest(OpCodes.BackupGet, {
        dmap: 'blobs',
        key: new Uint8Array([0xff, 0x00, 0xfe, 0xd8, 0x00]),
      });

      const bytes = codec.toBytes(msg);
      const decoded = await codec.fromBytes(bytes);

      expect(bytes[5]).toBe(5);
      expect(Array.from(bytes.subarray(17))).toEqual([0xff, 0x00, 0xfe, 0xd8, 0x00]);
      expect(decoded).toEqual(msg);
    });

    it('should decode consecutive frames from one stream', async () => {
      const codec = new ProtocolCodec();
      const first = createRequest(OpCodes.Increment, { dmap: 'counters', key: 'hits' });
      const second = createRequest(OpCodes.Unlock, { dmap: 'locks', key: 'job-7' });
      const out = new MemoryByteStream();

      await codec.encode(first, out);
      await codec.encode(second, out);
      const input = new MemoryByteStream(out.written());

      expect(await codec.decode(input)).toEqual(first);
      expect(await codec.decode(input)).toEqual(second);
      expect(input.remaining).toBe(0);
    });
  });

  describe('configuration', () => {
    it('should apply its ceiling in both directions', async () => {
      const codec = new ProtocolCodec({ maxValueSize: 3 });
      const msg = createRequest(OpCodes.Put, { value: new Uint8Array(4) });
      const wide = new ProtocolCodec();

      expect(codec.maxValueSize).toBe(3);
      expect(() => codec.toBytes(msg)).toThrow(ValueTooBigError);
      await expect(codec.fromBytes(wide.toBytes(msg))).rejects.toBeInstanceOf(ValueTooBigError);
    });

    it('should share an injected pool across codecs and concurrent calls', async () => {
      const pool = new BufferPool();
      const a = new ProtocolCodec({ pool });
      const b = new ProtocolCodec({ pool });
      const streams = Array.from({ length: 8 }, () => new MemoryByteStream());

      await Promise.all(
        streams.map((stream, i) =>
          (i % 2 === 0 ? a : b).encode(createRequest(OpCodes.Get, { key: `k${i}` }), stream)
        )
      );

      expect(pool.getStats().inUse).toBe(0);
      for (const [i, stream] of streams.entries()) {
        expect((await a.fromBytes(stream.written())).key).toEqual(utf8.encode(`k${i}`));
      }
    });
  });

  describe('fromBytes', () => {
    it('should reject trailing bytes', async () => {
      const codec = new ProtocolCodec();
      const frame = codec.toBytes(createRequest(OpCodes.Get, { key: 'x' }));
      const padded = new Uint8Array([...frame, 0]);

      await expect(codec.fromBytes(padded)).rejects.toThrow(
        'malformed frame: 1 trailing bytes after frame'
      );
    });
  });

  describe('tryDecode / tryEncode', () => {
    it('should capture a decoded message', async () => {
      const codec = new ProtocolCodec();
      const msg = createRequest(OpCodes.FindLock, { dmap: 'locks', key: 'a' });

      const result = await codec.tryDecode(new MemoryByteStream(codec.toBytes(msg)));

      expect(result.isSuccess).toBe(true);
      expect(result.result).toEqual(msg);
    });

    it('should capture a decode failure', async () => {
      const codec = new ProtocolCodec();

      const result = await codec.tryDecode(new MemoryByteStream(new Uint8Array(12)));

      expect(result.isSuccess).toBe(false);
      expect(result.errorCode).toBe('INVALID_MESSAGE');
    });

    it('should capture an encode failure', async () => {
      const codec = new ProtocolCodec({ maxValueSize: 0 });
      const stream = new MemoryByteStream();

      const result = await codec.tryEncode(
        createRequest(OpCodes.Put, { value: new Uint8Array(1) }),
        stream
      );

      expect(result.errorCode).toBe('VALUE_TOO_BIG');
      expect(stream.writeCount).toBe(0);
    });
  });
});
