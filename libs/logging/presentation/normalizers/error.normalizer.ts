import { ErrorCode } from '../../core/value-objects';

/**
 * Normalized error structure for consistent logging and error events.
 */
export interface NormalizedError {
  /** Stable error code for grouping/querying */
  code: string;
  /** Short, stable error message */
  message: string;
  /** Exception class name (e.g., 'AssetFetchError', 'TypeError') */
  exceptionName?: string;
  /** Truncated stack trace, outside production only */
  stack?: string;
}

/**
 * ErrorNormalizer - Normalizes thrown values to a consistent structure.
 *
 * `catch` hands over `unknown`: a domain error carrying its own `code`, a
 * plain Error, or anything else that was thrown.
 */
export class ErrorNormalizer {
  /** Maximum message length to prevent log bloat */
  private static readonly MAX_MESSAGE_LENGTH = 200;
  /** Maximum stack trace lines in development */
  private static readonly MAX_STACK_LINES = 5;
  /** Whether to include stack traces */
  private static readonly INCLUDE_STACK = process.env.NODE_ENV !== 'production';

  /**
   * Normalize any error to a consistent structure.
   */
  static normalize(error: unknown): NormalizedError {
    if (error instanceof Error) {
      return this.normalizeError(error);
    }

    return this.normalizeUnknown(error);
  }

  /**
   * Shorthand for log lines that only need the message.
   */
  static messageOf(error: unknown): string {
    return this.normalize(error).message;
  }

  private static normalizeError(error: Error): NormalizedError {
    const ownCode = 'code' in error ? error.code : undefined;
    const code =
      typeof ownCode === 'string' && ownCode !== ''
        ? ownCode
        : error.name === 'TimeoutError' || error.name === 'AbortError'
          ? ErrorCode.TIMEOUT
          : ErrorCode.INTERNAL_ERROR;

    return {
      code,
      message: this.truncateMessage(error.message || 'Unknown error'),
      exceptionName: error.constructor.name,
      stack: this.getStack(error),
    };
  }

  private static normalizeUnknown(error: unknown): NormalizedError {
    let message = 'Unknown error';
    if (typeof error === 'string') {
      message = error;
    } else if (typeof error === 'object' && error !== null) {
      try {
        message = JSON.stringify(error).slice(0, this.MAX_MESSAGE_LENGTH);
      } catch {
        message = String(error);
      }
    } else if (error !== undefined && error !== null) {
      message = String(error);
    }

    return {
      code: ErrorCode.UNKNOWN,
      message: this.truncateMessage(message),
    };
  }

  private static getStack(error: Error): string | undefined {
    if (!this.INCLUDE_STACK || !error.stack) {
      return undefined;
    }

    const lines = error.stack.split('\n');
    return lines.slice(0, this.MAX_STACK_LINES + 1).join('\n');
  }

  private static truncateMessage(message: string): string {
    if (message.length <= this.MAX_MESSAGE_LENGTH) {
      return message;
    }
    return message.slice(0, this.MAX_MESSAGE_LENGTH - 3) + '...';
  }
}
