export interface PushApiErrorDetails {
  status?: number;
  body?: string;
  cause?: unknown;
}

export class PushApiError extends Error {
  public readonly operation: string;
  public readonly status?: number;
  public readonly body?: string;

  constructor(operation: string, detail: string, details: PushApiErrorDetails = {}) {
    super(`${operation} error: ${detail}`, { cause: details.cause });
    this.name = 'PushApiError';
    this.operation = operation;
    this.status = details.status;
    this.body = details.body;
  }

  static fromResponse(
    operation: string,
    response: { status: number; statusText: string; body: string }
  ): PushApiError {
    const status = response.statusText
      ? `${response.status} ${response.statusText}`
      : String(response.status);
    return new PushApiError(operation, `${status}, ${response.body}`, {
      status: response.status,
      body: response.body
    });
  }
}

export class LimiterClosedError extends Error {
  constructor() {
    super('rate limiter is closed');
    this.name = 'LimiterClosedError';
  }
}

export class TransportTimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`request timed out after ${timeoutMs}ms`);
    this.name = 'TransportTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** Wraps a failure with the operation name, keeping the original as `cause`. */
export function wrapError(operation: string, error: unknown): PushApiError {
  if (error instanceof PushApiError && error.operation === operation) {
    return error;
  }
  if (error instanceof PushApiError) {
    return new PushApiError(operation, error.message, {
      status: error.status,
      body: error.body,
      cause: error
    });
  }
  return new PushApiError(operation, errorMessage(error), { cause: error });
}
