// src/lib/errors.ts

export class AppError extends Error {
  /** Text sent to the client; defaults to the message. */
  public readonly detail: string;

  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    options?: { cause?: unknown; detail?: string },
  ) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    this.detail = options?.detail ?? message;
  }
}

// Client input failed a required-field / non-blank check.
export class ValidationError extends AppError {
  constructor(message = 'Invalid request') {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

export class StorageUnavailableError extends AppError {
  constructor(message = 'Database is not configured') {
    super(message, 'STORAGE_UNAVAILABLE', 503);
  }
}

// Driver details stay in the message and cause for the logs; clients only see `detail`.
export class StorageError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'STORAGE_ERROR', 500, { cause, detail: 'Database error' });
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
