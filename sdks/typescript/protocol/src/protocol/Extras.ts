/**
 * Opcode-specific extra records.
 *
 * Each variant is a fixed-size big-endian record placed between the header and
 * the DMap. {@link extraKindFor} is the only table mapping opcodes to variants;
 * the decoder and the encoder both consult it, so registering a new opcode with
 * extra data means adding one entry there and one layout below.
 */

import { MalformedFrameError } from '@cachewire/core';
import { OpCodes, getOpCodeName } from './OpCodes.js';
import { readInt64, readUInt64, writeInt64, writeUInt64 } from './NetworkByteOrder.js';

/** Expiration for put-with-ttl, in milliseconds. */
export interface PutWithTtlExtra {
  readonly kind: 'putWithTtl';
  readonly ttl: bigint;
}

/** Lock deadline for lock-with-timeout and lock-previous, in milliseconds. */
export interface LockWithTimeoutExtra {
  readonly kind: 'lockWithTimeout';
  readonly ttl: bigint;
}

/** Partition addressed by the partition-occupancy queries. */
export interface PartitionQueryExtra {
  readonly kind: 'partitionQuery';
  readonly partitionId: bigint;
}

export type Extra = PutWithTtlExtra | LockWithTimeoutExtra | PartitionQueryExtra;

export type ExtraKind = Extra['kind'];

/**
 * Encoded size of each variant in bytes.
 */
export const EXTRA_SIZES: { readonly [K in ExtraKind]: number } = {
  putWithTtl: 8,
  lockWithTimeout: 8,
  partitionQuery: 8,
};

const EXTRA_KIND_BY_OP: ReadonlyMap<number, ExtraKind> = new Map<number, ExtraKind>([
  [OpCodes.PutWithTtl, 'putWithTtl'],
  [OpCodes.LockWithTimeout, 'lockWithTimeout'],
  [OpCodes.LockPrevious, 'lockWithTimeout'],
  [OpCodes.IsPartitionEmpty, 'partitionQuery'],
  [OpCodes.IsBackupPartitionEmpty, 'partitionQuery'],
]);

/**
 * The extra variant an opcode carries, or null when it carries none.
 */
export function extraKindFor(op: number): ExtraKind | null {
  return EXTRA_KIND_BY_OP.get(op) ?? null;
}

export function putWithTtl(ttl: bigint): PutWithTtlExtra {
  return { kind: 'putWithTtl', ttl };
}

export function lockWithTimeout(ttl: bigint): LockWithTimeoutExtra {
  return { kind: 'lockWithTimeout', ttl };
}

export function partitionQuery(partitionId: bigint): PartitionQueryExtra {
  return { kind: 'partitionQuery', partitionId };
}

/**
 * Encoded size of an extra record, 0 when there is none.
 */
export function extraSize(extra: Extra | null): number {
  return extra === null ? 0 : EXTRA_SIZES[extra.kind];
}

/**
 * Throws unless `extra` is absent or is the variant registered for `op`.
 */
export function assertExtraMatchesOp(op: number, extra: Extra | null): void {
  if (extra === null) {
    return;
  }
  const expected = extraKindFor(op);
  if (expected !== extra.kind) {
    throw new MalformedFrameError(
      `${getOpCodeName(op)} (${op}) expects ${expected ?? 'no'} extra, got ${extra.kind}`
    );
  }
}

/**
 * Writes an extra record at `offset`.
 */
export function writeExtra(view: DataView, offset: number, extra: Extra): void {
  switch (extra.kind) {
    case 'putWithTtl':
    case 'lockWithTimeout':
      writeInt64(view, offset, extra.ttl);
      break;
    case 'partitionQuery':
      writeUInt64(view, offset, extra.partitionId);
      break;
  }
}

/**
 * Reads the extra record of a request frame. `length` is the header's ExtraLen
 * and must equal the registered variant's size.
 */
export function readExtra(op: number, view: DataView, offset: number, length: number): Extra {
  const kind = extraKindFor(op);
  if (kind === null) {
    throw new MalformedFrameError(
      `${getOpCodeName(op)} (${op}) carries no extra, got ${length} bytes`
    );
  }
  if (length !== EXTRA_SIZES[kind]) {
    throw new MalformedFrameError(
      `${kind} extra is ${EXTRA_SIZES[kind]} bytes, header declares ${length}`
    );
  }

  switch (kind) {
    case 'putWithTtl':
      return putWithTtl(readInt64(view, offset));
    case 'lockWithTimeout':
      return lockWithTimeout(readInt64(view, offset));
    case 'partitionQuery':
      return partitionQuery(readUInt64(view, offset));
  }
}
