import { BufferPool } from './BufferPool.js';
import { MAX_BODY_LENGTH } from './protocol/Header.js';

/** Default ceiling for value payloads: 1 MiB */
export const DEFAULT_MAX_VALUE_SIZE = 1 << 20;

/**
 * Configuration handed to a codec at construction.
 */
export interface CodecOptions {
  /** Largest value payload accepted on decode or produced on encode (default: 1 MiB) */
  maxValueSize?: number;

  /** Scratch buffer pool; share one across codecs (default: a new pool) */
  pool?: BufferPool;
}

/**
 * Resolved configuration consulted by every decode and encode.
 */
export interface CodecContext {
  readonly maxValueSize: number;
  readonly pool: BufferPool;
}

/**
 * Fills defaults and validates options.
 * @throws RangeError if maxValueSize is not an integer between 0 and 2^32 - 1
 */
export function resolveCodecOptions(options: CodecOptions = {}): CodecContext {
  const maxValueSize = options.maxValueSize ?? DEFAULT_MAX_VALUE_SIZE;
  if (!Number.isInteger(maxValueSize) || maxValueSize < 0 || maxValueSize > MAX_BODY_LENGTH) {
    throw new RangeError(
      `maxValueSize must be an integer between 0 and ${MAX_BODY_LENGTH}, got ${maxValueSize}`
    );
  }

  return {
    maxValueSize,
    pool: options.pool ?? new BufferPool(),
  };
}
