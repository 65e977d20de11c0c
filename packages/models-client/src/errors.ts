/**
 * Field name -> messages reported by the API for a rejected payload.
 */
export type ValidationErrors = Record<string, string[]>;

export interface ApiRequestErrorDetails {
  status?: number;
  body?: string;
  cause?: unknown;
}

/**
 * Base failure for every call made against the models API. Raised directly for
 * transport failures, unexpected statuses and unreadable payloads.
 */
export class ApiRequestError extends Error {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, details: ApiRequestErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "ApiRequestError";
    this.status = details.status;
    this.body = details.body;
  }
}

/** 401: missing or rejected API key. */
export class AuthenticationError extends ApiRequestError {
  constructor(message: string, details: ApiRequestErrorDetails = {}) {
    super(message, details);
    this.name = "AuthenticationError";
  }
}

/** 400 / 422: the API rejected the payload or query. */
export class ValidationError extends ApiRequestError {
  readonly validationErrors: ValidationErrors;

  constructor(
    message: string,
    validationErrors: ValidationErrors,
    details: ApiRequestErrorDetails = {},
  ) {
    super(message, details);
    this.name = "ValidationError";
    this.validationErrors = validationErrors;
  }
}

export class NotFoundError extends ApiRequestError {
  constructor(message: string, details: ApiRequestErrorDetails = {}) {
    super(message, details);
    this.name = "NotFoundError";
  }
}

export class RateLimitError extends ApiRequestError {
  /** Parsed from `Retry-After` when the server sends it in seconds. */
  readonly retryAfterSeconds?: number;

  constructor(
    message: string,
    retryAfterSeconds: number | undefined,
    details: ApiRequestErrorDetails = {},
  ) {
    super(message, details);
    this.name = "RateLimitError";
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * Raised for any call issued after the client was closed.
 */
export class ClientClosedError extends ApiRequestError {
  constructor() {
    super("Models API client is closed");
    this.name = "ClientClosedError";
  }
}

export function isApiRequestError(error: unknown): error is ApiRequestError {
  return error instanceof ApiRequestError;
}
