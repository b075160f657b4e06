/**
 * PII Sanitization for Safe Logging
 *
 * Replaces contact details and free-text note contents with '[REDACTED]'
 * before they reach the logs.
 *
 * - Arrays are replaced with '[Array(N)]' summaries (never iterated into)
 * - customerName/customerCode are NOT redacted (needed to find a run in the logs)
 * - Depth limit of 10
 */

/** Set of field names whose values must never appear in logs */
export const PII_FIELDS: ReadonlySet<string> = new Set([
  'contactPhone',
  'contactTel',
  'mobile',
  'telePhone',
  'address',
  'installLocation',
  'rawText',
  'remark',
  'content',
  'responseBody',
]);

const MAX_DEPTH = 10;
const REDACTED = '[REDACTED]';

/**
 * Recursively sanitize a value for safe logging.
 *
 * - Primitives pass through unchanged
 * - PII field values are replaced with '[REDACTED]'
 * - Arrays are replaced with '[Array(N)]'
 * - Objects deeper than MAX_DEPTH are replaced with '[Object]'
 */
export function sanitizeForLog(obj: unknown, depth = 0): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return `[Array(${obj.length})]`;
  }

  if (depth >= MAX_DEPTH) {
    return '[Object]';
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = PII_FIELDS.has(key) ? REDACTED : sanitizeForLog(value, depth + 1);
  }

  return result;
}
