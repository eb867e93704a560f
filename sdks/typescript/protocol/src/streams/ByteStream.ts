/**
 * Bidirectional byte stream the codec reads frames from and writes frames to.
 * The connection behind it is owned and set up by the caller; deadlines and
 * cancellation belong to the implementation and surface as ordinary failures.
 */
export interface ByteStream {
  /**
   * Fills `target` completely, or rejects. The codec passes pooled memory, so
   * implementations must not keep a reference to `target` after settling.
   */
  readFull(target: Uint8Array): Promise<void>;

  /**
   * Writes every byte of `bytes`, or rejects. Resolves only once the stream no
   * longer references `bytes`, because the codec reuses that memory afterwards.
   */
  writeAll(bytes: Uint8Array): Promise<void>;
}
