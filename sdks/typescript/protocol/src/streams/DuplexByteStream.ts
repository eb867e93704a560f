import type { Duplex } from 'node:stream';
import { createWebSocketStream, type WebSocket } from 'ws';
import { StreamEndedError } from '@cachewire/core';
import type { ByteStream } from './ByteStream.js';

/**
 * {@link ByteStream} over a Node.js Duplex: `net.Socket`, `tls.TLSSocket`, or
 * the stream `ws` builds around a WebSocket.
 *
 * The readable side is consumed in paused mode, so unread bytes stay in the
 * Duplex's own buffer and backpressure reaches the peer. One read and one
 * write may be in flight at a time.
 */
export class DuplexByteStream implements ByteStream {
  private readonly stream: Duplex;
  private leftover: Uint8Array | null = null;
  private ended = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;

  constructor(stream: Duplex) {
    this.stream = stream;
    stream.on('readable', () => this.notify());
    stream.on('end', () => {
      this.ended = true;
      this.notify();
    });
    stream.on('close', () => {
      this.ended = true;
      this.notify();
    });
    stream.on('error', (error: Error) => {
      this.failure ??= error;
      this.notify();
    });
  }

  async readFull(target: Uint8Array): Promise<void> {
    let filled = 0;
    while (filled < target.length) {
      const chunk = this.nextChunk();
      if (chunk === null) {
        if (this.failure !== null) {
          throw this.failure;
        }
        if (this.ended || this.stream.readableEnded || this.stream.destroyed) {
          throw new StreamEndedError(target.length, filled);
        }
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        continue;
      }

      const wanted = target.length - filled;
      if (chunk.length > wanted) {
        target.set(chunk.subarray(0, wanted), filled);
        this.leftover = chunk.subarray(wanted);
        filled += wanted;
      } else {
        target.set(chunk, filled);
        filled += chunk.length;
      }
    }
  }

  /**
   * Writes a copy of `bytes`; a Duplex may keep a chunk past its write
   * callback (a PassThrough queues it for its reader).
   */
  writeAll(bytes: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.failure !== null) {
        reject(this.failure);
        return;
      }
      this.stream.write(Buffer.from(bytes), (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Ends the writable side once queued writes have flushed.
   */
  end(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.stream.end(() => resolve());
    });
  }

  private nextChunk(): Uint8Array | null {
    if (this.leftover !== null) {
      const chunk = this.leftover;
      this.leftover = null;
      return chunk;
    }

    const chunk: unknown = this.stream.read();
    if (chunk === null || chunk === undefined) {
      return null;
    }
    if (chunk instanceof Uint8Array) {
      return chunk;
    }
    if (typeof chunk === 'string') {
      return Buffer.from(chunk, 'utf8');
    }
    throw new TypeError(`Duplex yielded a non-byte chunk (${typeof chunk})`);
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

/**
 * Wraps a connected `ws` WebSocket as a byte stream. Frames may split or
 * join across WebSocket messages.
 */
export function fromWebSocket(socket: WebSocket): DuplexByteStream {
  return new DuplexByteStream(createWebSocketStream(socket));
}
