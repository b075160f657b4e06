// ============================================================================
// CRM HTTP Client — One POST per call, with timeout and error classification
// ============================================================================

import { crmConfig } from './config.js';
import { CrmAuthError, CrmRateLimitError, CrmTimeoutError, ExternalServiceError } from './errors.js';
import { CrmEnvelopeSchema, isSuccessCode } from './types/index.js';
import type { CrmEnvelope } from './types/index.js';

export const DEFAULT_TIMEOUT_MS = 15_000;

export interface CrmCallOptions {
  /** Per-call timeout; a timeout raises a retryable CrmTimeoutError */
  timeoutMs?: number;
}

function isTimeout(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

/**
 * POST a JSON body to a backend path and return the validated envelope.
 *
 * The access token travels as the `access_token` query parameter.
 *
 * @throws CrmTimeoutError when the call exceeds its timeout
 * @throws CrmRateLimitError / CrmAuthError on 429 / 401
 * @throws ExternalServiceError on any other transport, HTTP or envelope failure
 */
export async function crmPost(path: string, body: unknown, options: CrmCallOptions = {}): Promise<CrmEnvelope> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const url = `${crmConfig.baseUrl}${path}?access_token=${encodeURIComponent(crmConfig.accessToken)}`;

  // The timeout signal also covers reading the body
  let response: Response;
  let responseBody: string;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });
    responseBody = await response.text();
  } catch (error) {
    if (isTimeout(error)) {
      throw new CrmTimeoutError(path, timeoutMs);
    }
    throw new ExternalServiceError(
      `CRM API request failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      0,
      '',
    );
  }

  if (!response.ok) {
    if (response.status === 429) {
      throw new CrmRateLimitError(responseBody);
    }
    if (response.status === 401) {
      throw new CrmAuthError(responseBody);
    }
    throw new ExternalServiceError(
      `CRM API error: ${response.status} ${response.statusText}`,
      response.status,
      responseBody,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(responseBody);
  } catch {
    throw new ExternalServiceError('CRM API returned a non-JSON body', response.status, responseBody, {
      retryable: false,
    });
  }

  const parsed = CrmEnvelopeSchema.safeParse(json);
  if (!parsed.success) {
    throw new ExternalServiceError('CRM API response has no envelope code', response.status, responseBody, {
      retryable: false,
    });
  }

  const envelope = parsed.data;
  if (!isSuccessCode(envelope.code)) {
    throw new ExternalServiceError(
      `CRM API rejected request (${envelope.code}): ${envelope.message ?? 'no message'}`,
      response.status,
      responseBody,
      { backendCode: String(envelope.code), retryable: false },
    );
  }

  return envelope;
}

// ============================================================================
// Response Helpers
// ============================================================================

export function asRecord(value: unknown): Record<string, unknown> | undefined {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

/** First non-empty string (or number, stringified) among the given keys */
export function pickString(record: Record<string, unknown> | undefined, keys: readonly string[]): string | undefined {
  if (!record) return undefined;
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return undefined;
}

/** A customer reference as echoed by the backend: a bare id or `{ id }` */
export function readCustomerRef(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim()) return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return pickString(asRecord(value), ['id']);
}

/** Records from `data` (an array), `data.recordList` or `data.data` */
export function readRecordList(data: unknown): Record<string, unknown>[] {
  const block = asRecord(data);
  const list = Array.isArray(data) ? data : block?.recordList ?? block?.data;
  if (!Array.isArray(list)) return [];
  return list.map(asRecord).filter((record): record is Record<string, unknown> => record !== undefined);
}
