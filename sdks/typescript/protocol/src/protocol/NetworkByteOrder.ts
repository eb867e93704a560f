/**
 * Big-endian integer access for header and extra fields.
 *
 * 64-bit fields travel as two 32-bit words, high word first, and surface as
 * `bigint` so TTLs and partition ids keep every bit.
 */

const BIG_ENDIAN = false;
const LOW_WORD = 0xffffffffn;

export function writeUInt16(view: DataView, offset: number, value: number): void {
  view.setUint16(offset, value, BIG_ENDIAN);
}

export function writeUInt32(view: DataView, offset: number, value: number): void {
  view.setUint32(offset, value, BIG_ENDIAN);
}

/**
 * Writes the low 64 bits of `value`; wider values wrap.
 */
export function writeUInt64(view: DataView, offset: number, value: bigint): void {
  const word = BigInt.asUintN(64, value);
  view.setUint32(offset, Number(word >> 32n), BIG_ENDIAN);
  view.setUint32(offset + 4, Number(word & LOW_WORD), BIG_ENDIAN);
}

/**
 * Writes `value` in two's complement.
 */
export function writeInt64(view: DataView, offset: number, value: bigint): void {
  writeUInt64(view, offset, BigInt.asUintN(64, value));
}

export function readUInt16(view: DataView, offset: number): number {
  return view.getUint16(offset, BIG_ENDIAN);
}

export function readUInt32(view: DataView, offset: number): number {
  return view.getUint32(offset, BIG_ENDIAN);
}

export function readUInt64(view: DataView, offset: number): bigint {
  const high = view.getUint32(offset, BIG_ENDIAN);
  const low = view.getUint32(offset + 4, BIG_ENDIAN);
  return (BigInt(high) << 32n) | BigInt(low);
}

export function readInt64(view: DataView, offset: number): bigint {
  return BigInt.asIntN(64, readUInt64(view, offset));
}

/**
 * DataView over exactly the window a Uint8Array covers, which may be a
 * subarray of a larger pooled buffer.
 */
export function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
