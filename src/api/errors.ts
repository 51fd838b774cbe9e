import axios from 'axios';

/**
 * A platform call that failed for good: the server answered with an error
 * status, or the request never got an answer and retries ran out.
 */
export class ApiError extends Error {
  public readonly method: string;
  public readonly status?: number;
  public readonly details?: unknown;

  constructor(message: string, method: string, status?: number, details?: unknown) {
    super(message);
    this.name = 'ApiError';
    this.method = method;
    this.status = status;
    this.details = details;
  }
}

/** Polling for a status gave up before the status was reached. */
export class WaitingTimeExceeded extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WaitingTimeExceeded';
  }
}

/** The task being waited on ended with status `error`. */
export class TaskFinishedWithError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskFinishedWithError';
  }
}

/**
 * Pulls the human-readable reason out of an error body. The platform puts it
 * under `error`, `message` or `details.message` depending on the endpoint.
 */
function serverMessage(data: unknown): string | undefined {
  if (typeof data === 'string') {
    return data.length > 0 ? data : undefined;
  }
  if (typeof data !== 'object' || data === null) {
    return undefined;
  }
  if ('error' in data && typeof data.error === 'string') {
    return data.error;
  }
  if ('message' in data && typeof data.message === 'string') {
    return data.message;
  }
  if ('details' in data && typeof data.details === 'object' && data.details !== null) {
    return serverMessage(data.details);
  }
  return undefined;
}

/**
 * Converts whatever a request threw into an `ApiError` for `method`.
 */
export function toApiError(method: string, err: unknown): ApiError {
  if (err instanceof ApiError) {
    return err;
  }
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const details = err.response?.data;
    const reason = serverMessage(details) ?? err.message;
    const message =
      status === undefined
        ? `${method} failed: ${reason}`
        : `${method} failed with status ${status}: ${reason}`;
    return new ApiError(message, method, status, details);
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new ApiError(`${method} failed: ${reason}`, method);
}
