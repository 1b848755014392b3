import { MemeAnimatorError } from './base.error.js';

interface AppErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage?: boolean;
}

export class AppError extends MemeAnimatorError {
  private constructor(options: AppErrorOptions) {
    super({
      code: options.code,
      message: options.message,
      metadata: options.metadata,
      cause: options.cause,
      exposeMessage: options.exposeMessage ?? false,
    });
  }

  /**
   * Known errors pass through untouched so callers can still branch on their class.
   */
  public static fromUnknown(error: unknown, code = 'UNEXPECTED_ERROR'): MemeAnimatorError {
    if (error instanceof MemeAnimatorError) {
      return error;
    }

    const cause = error instanceof Error ? error : new Error('Unknown error');
    return new AppError({ code, message: cause.message, cause, exposeMessage: false });
  }

  public static fromError(error: Error, code = 'UNEXPECTED_ERROR'): AppError {
    return new AppError({ code, message: error.message, cause: error, exposeMessage: false });
  }

  /** Rebuilds an error that lost its class crossing a thread boundary. */
  public static restore(options: AppErrorOptions): AppError {
    return new AppError(options);
  }

  public static unsupported(
    code: string,
    message: string,
    metadata?: Record<string, unknown>,
  ): AppError {
    return new AppError({
      code,
      message,
      metadata,
      exposeMessage: false,
    });
  }
}
