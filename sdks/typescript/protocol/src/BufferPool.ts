/**
 * Reusable scratch memory for decoding and encoding frames.
 *
 * One pool is created at process start and handed to every codec. Each
 * concurrent decode or encode call acquires its own {@link ScratchBuffer}, owns
 * it exclusively until release, and never waits on another call's buffer:
 * an empty pool simply allocates.
 */

/**
 * Growable byte region. `reserve` hands out a window over the same storage,
 * so a window is only valid until the next `reserve` or the buffer's release.
 */
export class ScratchBuffer {
  private storage: Uint8Array;
  private readonly sizeClass: number;

  constructor(initialCapacity: number, sizeClass: number) {
    this.sizeClass = sizeClass;
    this.storage = new Uint8Array(roundUp(initialCapacity, sizeClass));
  }

  get capacity(): number {
    return this.storage.byteLength;
  }

  /**
   * Returns a window of exactly `size` bytes, growing the storage in whole
   * size classes when needed. Contents are not preserved across growth.
   */
  reserve(size: number): Uint8Array {
    if (size > this.storage.byteLength) {
      this.storage = new Uint8Array(roundUp(size, this.sizeClass));
    }
    return this.storage.subarray(0, size);
  }

  /**
   * Zeroes the storage.
   */
  wipe(): void {
    this.storage.fill(0);
  }
}

export interface BufferPoolOptions {
  /** Capacity of newly created buffers (default: 512 bytes) */
  initialCapacity?: number;

  /** Buffers grow in multiples of this size (default: 256 bytes) */
  sizeClass?: number;

  /** Most buffers kept for reuse; extras are left to the garbage collector (default: 64) */
  maxRetained?: number;

  /** Buffers that grew beyond this are dropped on release (default: 4 MiB) */
  maxRetainedCapacity?: number;

  /** Zero buffers before returning them to the pool (default: false for performance) */
  zeroOnRelease?: boolean;
}

export class BufferPool {
  private readonly free: ScratchBuffer[] = [];
  private readonly initialCapacity: number;
  private readonly sizeClass: number;
  private readonly maxRetained: number;
  private readonly maxRetainedCapacity: number;
  private readonly zeroOnRelease: boolean;
  private outstanding = 0;

  constructor(options: BufferPoolOptions = {}) {
    this.initialCapacity = requirePositive('initialCapacity', options.initialCapacity ?? 512);
    this.sizeClass = requirePositive('sizeClass', options.sizeClass ?? 256);
    this.maxRetained = requireNonNegative('maxRetained', options.maxRetained ?? 64);
    this.maxRetainedCapacity = requirePositive(
      'maxRetainedCapacity',
      options.maxRetainedCapacity ?? 4 * 1024 * 1024
    );
    this.zeroOnRelease = options.zeroOnRelease ?? false;
  }

  /**
   * Takes a buffer from the pool, or allocates one if the pool is empty.
   * The caller must release it exactly once.
   */
  acquire(): ScratchBuffer {
    this.outstanding++;
    return this.free.pop() ?? new ScratchBuffer(this.initialCapacity, this.sizeClass);
  }

  /**
   * Returns a buffer to the pool.
   *
   * WARNING: windows previously obtained from the buffer must not be used afterwards.
   */
  release(buffer: ScratchBuffer): void {
    this.outstanding = Math.max(0, this.outstanding - 1);

    if (buffer.capacity > this.maxRetainedCapacity || this.free.length >= this.maxRetained) {
      return;
    }
    if (this.zeroOnRelease) {
      buffer.wipe();
    }
    this.free.push(buffer);
  }

  /**
   * Runs `task` with a pooled buffer and releases it however the task settles.
   */
  async withBuffer<T>(task: (buffer: ScratchBuffer) => Promise<T>): Promise<T> {
    const buffer = this.acquire();
    try {
      return await task(buffer);
    } finally {
      this.release(buffer);
    }
  }

  /**
   * Get current pool statistics.
   */
  getStats(): { available: number; inUse: number } {
    return { available: this.free.length, inUse: this.outstanding };
  }

  /**
   * Drop all pooled buffers.
   */
  clear(): void {
    this.free.length = 0;
  }
}

function roundUp(size: number, sizeClass: number): number {
  return Math.max(1, Math.ceil(size / sizeClass)) * sizeClass;
}

function requirePositive(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function requireNonNegative(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}
