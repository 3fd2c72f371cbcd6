/**
 * AppError - Custom error class for application errors
 * Distinguishes between system errors (500), storage outages (503) and bad input (400)
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);

    Object.setPrototypeOf(this, AppError.prototype);
  }

  /**
   * Wraps a storage driver error. The operation it interrupted must be reported as not done.
   */
  static persistence(operation: string, cause: unknown): AppError {
    const detail = cause instanceof Error ? cause.message : 'Unknown error';
    return new AppError(`Persistence failure during ${operation}: ${detail}`, 503);
  }

  get isPersistenceFailure(): boolean {
    return this.statusCode === 503;
  }
}
