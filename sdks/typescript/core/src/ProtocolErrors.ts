/**
 * Error taxonomy for the cachewire binary protocol.
 *
 * Every failure the codec reports is a {@link ProtocolError} carrying a stable
 * `code`, so callers can branch on the kind of failure without parsing messages.
 * The codec never retries and never logs; recovery, logging and connection
 * teardown are the caller's decisions.
 */

/**
 * Stable identifiers for each protocol failure.
 */
export const ProtocolErrorCodes = {
  /** First header byte is neither the request nor the response magic. */
  InvalidMessage: 'INVALID_MESSAGE',

  /** Declared or supplied value is larger than the configured ceiling. */
  ValueTooBig: 'VALUE_TOO_BIG',

  /** Header lengths, extra record or field bytes are structurally wrong. */
  MalformedFrame: 'MALFORMED_FRAME',

  /** The other side hung up. */
  ConnectionClosed: 'CONNECTION_CLOSED',

  /** The stream ended before a read could be satisfied. */
  StreamEnded: 'STREAM_ENDED',
} as const;

export type ProtocolErrorCode = (typeof ProtocolErrorCodes)[keyof typeof ProtocolErrorCodes];

/**
 * Base class for all protocol failures.
 */
export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ProtocolError';
    this.code = code;
  }
}

/**
 * Unrecognized magic code in the first header byte.
 * Fatal for the current message; the caller decides whether to keep the connection.
 */
export class InvalidMessageError extends ProtocolError {
  readonly magic: number;

  constructor(magic: number) {
    super(
      ProtocolErrorCodes.InvalidMessage,
      `invalid message: unknown magic code 0x${magic.toString(16).padStart(2, '0')}`
    );
    this.name = 'InvalidMessageError';
    this.magic = magic;
  }
}

/**
 * Value length above the configured `maxValueSize`.
 * On decode this is raised before the body is read, so the stream is left
 * positioned inside the oversized frame.
 */
export class ValueTooBigError extends ProtocolError {
  readonly declared: number;
  readonly limit: number;

  constructor(declared: number, limit: number) {
    super(ProtocolErrorCodes.ValueTooBig, `value too big: ${declared} bytes exceeds limit of ${limit}`);
    this.name = 'ValueTooBigError';
    this.declared = declared;
    this.limit = limit;
  }
}

/**
 * Structurally invalid frame or message: inconsistent header lengths, an extra
 * record that does not match its opcode, invalid UTF-8, or a field too large
 * for its header width.
 */
export class MalformedFrameError extends ProtocolError {
  constructor(message: string, options?: ErrorOptions) {
    super(ProtocolErrorCodes.MalformedFrame, `malformed frame: ${message}`, options);
    this.name = 'MalformedFrameError';
  }
}

/**
 * Canonical sentinel for a transport that was already closed, whatever wording
 * the operating system or stream implementation used. Do not retry on the same stream.
 */
export class ConnectionClosedError extends ProtocolError {
  constructor(options?: ErrorOptions) {
    super(ProtocolErrorCodes.ConnectionClosed, 'connection closed', options);
    this.name = 'ConnectionClosedError';
  }
}

/**
 * The stream ended after `received` of `expected` bytes.
 */
export class StreamEndedError extends ProtocolError {
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number) {
    super(
      ProtocolErrorCodes.StreamEnded,
      `stream ended after ${received} of ${expected} bytes`
    );
    this.name = 'StreamEndedError';
    this.expected = expected;
    this.received = received;
  }
}

/**
 * Type guard for protocol errors, optionally narrowed to one code.
 */
export function isProtocolError(value: unknown, code?: ProtocolErrorCode): value is ProtocolError {
  if (!(value instanceof ProtocolError)) {
    return false;
  }
  return code === undefined || value.code === code;
}

/**
 * Display text of a failure cause. Plain descriptions are used as they are,
 * errors by their message, anything else by its string form.
 */
export function toFailureText(cause: unknown): string {
  if (typeof cause === 'string') {
    return cause;
  }
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
