import { ProtocolError, toFailureText } from './ProtocolErrors.js';

/**
 * Outcome of a codec call, holding either the value or the failure.
 * For callers that prefer explicit branching over `try`/`catch`.
 * @typeParam T - The value type on success.
 */
export class CodecResult<T> {
  /**
   * Whether the call succeeded.
   */
  readonly isSuccess: boolean;

  /**
   * The value. Only set when isSuccess is true.
   */
  readonly result?: T;

  /**
   * The failure. Only set when isSuccess is false.
   */
  readonly error?: Error;

  private constructor(isSuccess: boolean, result?: T, error?: Error) {
    this.isSuccess = isSuccess;
    this.result = result;
    this.error = error;
  }

  /**
   * Creates a successful result.
   */
  static success<T>(result: T): CodecResult<T> {
    return new CodecResult<T>(true, result, undefined);
  }

  /**
   * Creates a failed result. Non-Error causes are wrapped so `error` is always an Error.
   */
  static failure<T>(cause: unknown): CodecResult<T> {
    const error = cause instanceof Error ? cause : new Error(toFailureText(cause));
    return new CodecResult<T>(false, undefined, error);
  }

  /**
   * Runs an async operation and captures its outcome.
   */
  static async capture<T>(operation: () => Promise<T>): Promise<CodecResult<T>> {
    try {
      return CodecResult.success(await operation());
    } catch (error) {
      return CodecResult.failure<T>(error);
    }
  }

  /**
   * Protocol error code of the failure, or null for successes and foreign errors.
   */
  get errorCode(): string | null {
    return this.error instanceof ProtocolError ? this.error.code : null;
  }

  /**
   * Gets the value if successful, or rethrows the captured failure.
   * @throws the captured Error when the result is a failure.
   */
  getResultOrThrow(): T | undefined {
    if (this.isSuccess) {
      return this.result;
    }
    throw this.error ?? new Error('Codec call failed');
  }
}
