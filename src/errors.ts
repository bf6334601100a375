/**
 * Error codes for programmatic error handling
 *
 * Only structural failures surface as errors. A missing key, source or
 * locale is never an error: lookups degrade to the key itself.
 *
 * @example
 * ```typescript
 * try {
 *   resolver.lookup('validation.required');
 * } catch (error) {
 *   if (TranslatorError.isTranslatorError(error)) {
 *     switch (error.code) {
 *       case TranslatorErrorCode.INVALID_SOURCE_DATA:
 *         console.log('Fix the translation file');
 *         break;
 *     }
 *   }
 * }
 * ```
 */
export enum TranslatorErrorCode {
  /** A discovered translation file could not be parsed into a tree */
  INVALID_SOURCE_DATA = 'TRANSLATOR_INVALID_SOURCE_DATA',

  /** A discovered translation file exists but could not be read */
  SOURCE_READ_FAILED = 'TRANSLATOR_SOURCE_READ_FAILED',

  /** Resolver configuration failed validation */
  INVALID_CONFIG = 'TRANSLATOR_INVALID_CONFIG',
}

/**
 * Structured error for load and configuration failures
 */
export class TranslatorError extends Error {
  /**
   * @param code - Error code for programmatic handling
   * @param message - Human-readable error message
   * @param cause - Original error that caused this error (optional)
   */
  constructor(
    public readonly code: TranslatorErrorCode,
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'TranslatorError';

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TranslatorError);
    }
  }

  static isTranslatorError(error: unknown): error is TranslatorError {
    return error instanceof TranslatorError;
  }

  /**
   * Convert error to JSON (excludes cause to prevent circular refs)
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }

  /**
   * Custom inspect for Node.js util.inspect
   */
  [Symbol.for('nodejs.util.inspect.custom')](): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;
    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
    }
    return result;
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
