/**
 * Sanitizers applied to audit metadata before it is written.
 *
 * Reviewer notes travel in metadata as free text, so contact details and
 * credentials typed into them are redacted. Reason strings in `detail` are
 * built by the engine and are not touched.
 */

const MAX_DETAIL_LENGTH = 500;

/**
 * Redact emails, bearer tokens and key-like values; cap length.
 *
 * @param detail - Free text such as a reviewer note
 * @returns Sanitized text (max 500 chars)
 */
export function sanitizeAuditDetail(detail: string): string {
  if (!detail) {
    return '';
  }

  let sanitized = detail;

  sanitized = sanitized.replace(
    /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
    '[EMAIL_REDACTED]',
  );

  sanitized = sanitized.replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]');
  sanitized = sanitized.replace(/token[:=\s]+[^\s]+/gi, 'token: [REDACTED]');
  sanitized = sanitized.replace(/api[_-]?key[:=\s]+[^\s]+/gi, 'api_key: [REDACTED]');
  sanitized = sanitized.replace(/password[:=\s]+[^\s]+/gi, 'password: [REDACTED]');

  return sanitized.substring(0, MAX_DETAIL_LENGTH);
}

/**
 * Keep only JSON-safe scalar metadata values; nested objects are serialized
 * and truncated so one entry cannot blow up a log line.
 */
export function sanitizeAuditMetadata(
  metadata: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(metadata)) {
    if (value === undefined) {
      continue;
    }
    if (
      value === null ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      result[key] = value;
    } else if (typeof value === 'string') {
      result[key] = sanitizeAuditDetail(value);
    } else if (value instanceof Date) {
      result[key] = value.toISOString();
    } else if (Array.isArray(value) && value.every((v) => typeof v === 'string')) {
      result[key] = value.map((v: string) => sanitizeAuditDetail(v));
    } else {
      result[key] = JSON.stringify(value).substring(0, MAX_DETAIL_LENGTH);
    }
  }

  return result;
}
