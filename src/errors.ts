/**
 * Error raised by every failing KeyEnv client operation.
 *
 * `status` is the HTTP status of the failed response, or `0` when the failure
 * happened before a response was received (network error, timeout), while
 * decoding a success response, or while validating client options.
 */
export class KeyEnvError extends Error {
  public readonly status: number;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    status = 0,
    code?: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'KeyEnvError';
    this.status = status;
    this.code = code;
    this.details = details;
  }

  get isUnauthorized(): boolean {
    return this.status === 401;
  }

  get isForbidden(): boolean {
    return this.status === 403;
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }

  get isConflict(): boolean {
    return this.status === 409;
  }

  get isRateLimited(): boolean {
    return this.status === 429;
  }

  get isServerError(): boolean {
    return this.status >= 500;
  }
}

/** Narrow an unknown rejection to a 404 from the API. */
export function isNotFoundError(error: unknown): error is KeyEnvError {
  return error instanceof KeyEnvError && error.isNotFound;
}
