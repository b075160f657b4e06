// ============================================================================
// CRM Error Types — Typed errors for backend call failures
// ============================================================================

/**
 * Base error for every failed backend call: transport failure, non-2xx HTTP
 * status, or a 2xx response whose envelope `code` is not a success code.
 * Carries the HTTP status (0 when the request never completed) and the raw
 * response body for debugging.
 * NEVER includes note contents (names, phone numbers, addresses) in messages.
 */
export class ExternalServiceError extends Error {
  readonly statusCode: number;
  readonly responseBody: string;
  /** Envelope `code` reported by the backend, when one was returned */
  readonly backendCode: string | undefined;
  /** Whether repeating the same call later may succeed */
  readonly retryable: boolean;

  constructor(
    message: string,
    statusCode: number,
    responseBody: string,
    options: { backendCode?: string; retryable?: boolean } = {},
  ) {
    super(message);
    this.name = 'ExternalServiceError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
    this.backendCode = options.backendCode;
    this.retryable = options.retryable ?? (statusCode === 0 || statusCode >= 500);
  }
}

/**
 * Thrown on HTTP 429 (Too Many Requests).
 * Callers may retry after backoff.
 */
export class CrmRateLimitError extends ExternalServiceError {
  constructor(responseBody: string) {
    super('CRM API rate limit exceeded (429). Retry after backoff.', 429, responseBody, { retryable: true });
    this.name = 'CrmRateLimitError';
  }
}

/**
 * Thrown on HTTP 401 (Unauthorized).
 * Indicates the access token is invalid or expired.
 */
export class CrmAuthError extends ExternalServiceError {
  constructor(responseBody: string) {
    super(
      'CRM API authentication failed (401). Check that CRM_ACCESS_TOKEN is valid.',
      401,
      responseBody,
      { retryable: false },
    );
    this.name = 'CrmAuthError';
  }
}

/** Thrown when a call exceeds its per-call timeout. Always retryable. */
export class CrmTimeoutError extends ExternalServiceError {
  readonly timeoutMs: number;

  constructor(path: string, timeoutMs: number) {
    super(`CRM API request to ${path} timed out after ${timeoutMs}ms`, 0, '', { retryable: true });
    this.name = 'CrmTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}
