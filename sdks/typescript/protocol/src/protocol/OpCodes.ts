/**
 * Operation codes carried in the second header byte.
 *
 * Numeric values are part of the wire format and must not be reordered;
 * nodes of existing deployments rely on them.
 */
export const OpCodes = {
  /** Store a value. */
  Put: 0,

  /** Store a value with an expiration (extra: putWithTtl). */
  PutWithTtl: 1,

  /** Fetch a value. */
  Get: 2,

  /** Remove a key. */
  Delete: 3,

  /** Destroy a whole map. */
  Destroy: 4,

  /** Acquire a lock with a deadline (extra: lockWithTimeout). */
  LockWithTimeout: 5,

  /** Release a lock. */
  Unlock: 6,

  /** Atomic increment. */
  Increment: 7,

  /** Atomic decrement. */
  Decrement: 8,

  /** Store a value and return the previous one. */
  GetAndPut: 9,

  /** Push a new routing table to a node. */
  UpdateRouting: 10,

  /** Store a value on a backup replica. */
  BackupPut: 11,

  /** Delete a key from the previous owner of a partition. */
  DeletePrevious: 12,

  /** Fetch a key from the previous owner of a partition. */
  GetPrevious: 13,

  /** Fetch a value from a backup replica. */
  BackupGet: 14,

  /** Look up a lock on the partition owner. */
  FindLock: 15,

  /** Acquire a lock on the previous owner (extra: lockWithTimeout). */
  LockPrevious: 16,

  /** Release a lock on the previous owner. */
  UnlockPrevious: 17,

  /** Delete a key from a backup replica. */
  BackupDelete: 18,

  /** Destroy a map on a replica. */
  DestroyMapReplica: 19,

  /** Move a map's partition data to its new owner. */
  MoveMap: 20,

  /** Move a map's backup data to its new owner. */
  BackupMoveMap: 21,

  /** Ask whether a partition holds data (extra: partitionQuery). */
  IsPartitionEmpty: 22,

  /** Ask whether a backup partition holds data (extra: partitionQuery). */
  IsBackupPartitionEmpty: 23,
} as const;

export type OpCode = (typeof OpCodes)[keyof typeof OpCodes];

const OP_CODE_NAMES: ReadonlyMap<number, string> = new Map(
  Object.entries(OpCodes).map(([name, value]): [number, string] => [value, name])
);

/**
 * Check if a byte is a known operation code.
 */
export function isOpCode(value: number): value is OpCode {
  return OP_CODE_NAMES.has(value);
}

/**
 * Gets a human-readable name for an operation code.
 */
export function getOpCodeName(op: number): string {
  return OP_CODE_NAMES.get(op) ?? 'UnknownOperation';
}
