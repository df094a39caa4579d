/**
 * Error types shared across the CLI, configuration and HTTP clients.
 * Git-specific errors live in `@/services/vcs/types`.
 */

export class PrCreatorError extends Error {
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'PrCreatorError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Missing or invalid settings (tokens, repo slug, client options).
 */
export class ConfigurationError extends PrCreatorError {
  public override readonly name: string = 'ConfigurationError';
}

/**
 * Failure talking to a remote HTTP API.
 * `status` is undefined when no response was received.
 */
export class ApiClientError extends PrCreatorError {
  public override readonly name: string = 'ApiClientError';

  constructor(
    message: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, cause);
  }
}

export class CompletionError extends ApiClientError {
  public override readonly name = 'CompletionError';
}

export class TicketClientError extends ApiClientError {
  public override readonly name = 'TicketClientError';
}

export class HostingError extends ApiClientError {
  public override readonly name = 'HostingError';
}

/**
 * Normalize unknown error-like values to a human-readable message.
 */
export function toErrorMessage(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Error) {
    return value.message;
  }
  if (value !== null && typeof value === 'object' && 'message' in value) {
    const candidate = value.message;
    if (typeof candidate === 'string') {
      return candidate;
    }
  }
  try {
    return String(value);
  } catch {
    return 'Unknown error';
  }
}

/**
 * Wrap a non-Error throwable so it can be used as a `cause`.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(toErrorMessage(value));
}

/**
 * Check for a Node.js system error code such as `ENOENT`.
 */
export function hasErrorCode(value: unknown, code: string): boolean {
  return value instanceof Error && 'code' in value && value.code === code;
}
