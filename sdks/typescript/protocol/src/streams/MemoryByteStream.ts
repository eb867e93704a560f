import { StreamEndedError } from '@cachewire/core';
import type { ByteStream } from './ByteStream.js';

/**
 * In-memory {@link ByteStream}: reads from a fixed byte array and records
 * everything written to it. Used to decode standalone frames and in tests.
 */
export class MemoryByteStream implements ByteStream {
  private readonly input: Uint8Array;
  private position = 0;
  private readonly chunks: Uint8Array[] = [];

  constructor(input: Uint8Array = new Uint8Array(0)) {
    this.input = input;
  }

  /** Bytes not yet consumed by reads */
  get remaining(): number {
    return this.input.length - this.position;
  }

  /** Number of writeAll calls so far */
  get writeCount(): number {
    return this.chunks.length;
  }

  async readFull(target: Uint8Array): Promise<void> {
    const available = Math.min(target.length, this.remaining);
    target.set(this.input.subarray(this.position, this.position + available));
    this.position += available;
    if (available < target.length) {
      throw new StreamEndedError(target.length, available);
    }
  }

  async writeAll(bytes: Uint8Array): Promise<void> {
    this.chunks.push(bytes.slice());
  }

  /**
   * Everything written so far, concatenated.
   */
  written(): Uint8Array {
    const total = this.chunks.reduce((sum, chunk) => sum + chunk.length, 0);
    const result = new Uint8Array(total);
    let offset = 0;
    for (const chunk of this.chunks) {
      result.set(chunk, offset);
      offset += chunk.length;
    }
    return result;
  }
}
