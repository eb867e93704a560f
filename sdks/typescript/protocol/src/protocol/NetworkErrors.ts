import { ConnectionClosedError, StreamEndedError } from '@cachewire/core';

/** Error codes Node and its stream implementations use for a transport that is gone. */
const CLOSED_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'EPIPE',
  'ERR_STREAM_DESTROYED',
  'ERR_STREAM_WRITE_AFTER_END',
  'ERR_STREAM_PREMATURE_CLOSE',
  'ERR_SOCKET_CLOSED',
]);

/** Lowercase message fragments meaning the same, for errors that carry no code. */
const CLOSED_WORDINGS = [
  'use of closed network connection',
  'socket has been ended',
  'write after end',
  'premature close',
  'stream was destroyed',
  'connection reset',
  'broken pipe',
  'econnreset',
  'epipe',
];

function errorCodeOf(error: Error): string | null {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : null;
}

/**
 * Whether a failure means the transport was already closed.
 * A stream that ended before yielding a single byte of the read is a hang-up
 * between frames; one that ended part-way through is a truncated frame and
 * does not count.
 */
export function isConnectionClosed(error: unknown): boolean {
  if (error instanceof ConnectionClosedError) {
    return true;
  }
  if (error instanceof StreamEndedError) {
    return error.received === 0;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  const code = errorCodeOf(error);
  if (code !== null && CLOSED_CODES.has(code)) {
    return true;
  }
  const message = error.message.toLowerCase();
  return CLOSED_WORDINGS.some((wording) => message.includes(wording));
}

/**
 * Maps any closed-transport failure to the single {@link ConnectionClosedError}
 * sentinel and returns every other failure unchanged.
 */
export function normalizeNetworkError(error: unknown): unknown {
  if (error instanceof ConnectionClosedError || !isConnectionClosed(error)) {
    return error;
  }
  return new ConnectionClosedError({ cause: error });
}
