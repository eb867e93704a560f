/**
 * Unit tests for StatusCodes and OpCodes.
 */

import { describe, it, expect } from 'vitest';
import { StatusCodes, getStatusName, isSuccess, isError } from '../protocol/StatusCodes.js';
import { OpCodes, isOpCode, getOpCodeName } from '../protocol/OpCodes.js';

describe('StatusCodes', () => {
  it('should have correct values matching the wire format', () => {
    expect(StatusCodes.OK).toBe(0);
    expect(StatusCodes.InternalServerError).toBe(1);
    expect(StatusCodes.KeyNotFound).toBe(2);
    expect(StatusCodes.NoSuchLock).toBe(3);
    expect(StatusCodes.PartitionNotEmpty).toBe(4);
    expect(StatusCodes.BackupPartitionNotEmpty).toBe(5);
  });

  it('should name known codes', () => {
    expect(getStatusName(StatusCodes.KeyNotFound)).toBe('KeyNotFound');
    expect(getStatusName(StatusCodes.OK)).toBe('OK');
  });

  it('should return UnknownStatus for unknown codes', () => {
    expect(getStatusName(99)).toBe('UnknownStatus');
  });

  it('should classify success and error codes', () => {
    expect(isSuccess(StatusCodes.OK)).toBe(true);
    expect(isError(StatusCodes.OK)).toBe(false);
    expect(isSuccess(StatusCodes.NoSuchLock)).toBe(false);
    expect(isError(StatusCodes.NoSuchLock)).toBe(true);
  });
});

describe('OpCodes', () => {
  it('should keep the numeric values used by existing deployments', () => {
    expect(OpCodes.Put).toBe(0);
    expect(OpCodes.PutWithTtl).toBe(1);
    expect(OpCodes.Get).toBe(2);
    expect(OpCodes.Delete).toBe(3);
    expect(OpCodes.Destroy).toBe(4);
    expect(OpCodes.LockWithTimeout).toBe(5);
    expect(OpCodes.Unlock).toBe(6);
    expect(OpCodes.Increment).toBe(7);
    expect(OpCodes.Decrement).toBe(8);
    expect(OpCodes.GetAndPut).toBe(9);
    expect(OpCodes.UpdateRouting).toBe(10);
    expect(OpCodes.BackupPut).toBe(11);
    expect(OpCodes.DeletePrevious).toBe(12);
    expect(OpCodes.GetPrevious).toBe(13);
    expect(OpCodes.BackupGet).toBe(14);
    expect(OpCodes.FindLock).toBe(15);
    expect(OpCodes.LockPrevious).toBe(16);
    expect(OpCodes.UnlockPrevious).toBe(17);
    expect(OpCodes.BackupDelete).toBe(18);
    expect(OpCodes.DestroyMapReplica).toBe(19);
    expect(OpCodes.MoveMap).toBe(20);
    expect(OpCodes.BackupMoveMap).toBe(21);
    expect(OpCodes.IsPartitionEmpty).toBe(22);
    expect(OpCodes.IsBackupPartitionEmpty).toBe(23);
  });

  it('should have unique values', () => {
    const values = Object.values(OpCodes);
    expect(new Set(values).size).toBe(values.length);
  });

  it('should recognize known opcodes only', () => {
    expect(isOpCode(0)).toBe(true);
    expect(isOpCode(23)).toBe(true);
    expect(isOpCode(24)).toBe(false);
  });

  it('should name opcodes', () => {
    expect(getOpCodeName(OpCodes.MoveMap)).toBe('MoveMap');
    expect(getOpCodeName(200)).toBe('UnknownOperation');
  });
});
