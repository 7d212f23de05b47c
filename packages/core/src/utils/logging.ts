/**
 * Logging Utilities - Safe object serialization for logging
 */

const SENSITIVE_HEADERS = [
  'authorization',
  'proxy-authorization',
  'api-key',
  'x-api-key',
  'password',
  'token',
  'cookie',
  'set-cookie',
];

/**
 * Safely serialize objects for logging
 * Prevents circular reference errors and safely handles various object types.
 */
export function serializeForLog(obj: unknown): unknown {
  try {
    if (obj === null || obj === undefined) return obj;
    if (typeof obj !== 'object') return obj;
    return JSON.parse(JSON.stringify(obj));
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : 'unknown error';
    return `[Unserializable object: ${errorMsg}]`;
  }
}

/**
 * Truncate a string to a maximum length
 * If the string exceeds maxLength, appends "..." to indicate truncation.
 */
export function truncateString(str: string, maxLength: number = 500): string {
  if (str.length <= maxLength) return str;
  return str.substring(0, maxLength) + '...';
}

/**
 * Mask values of headers that typically carry credentials.
 * Array values (set-cookie) are joined with ", ".
 */
export function sanitizeHeadersForLog(headers?: object): Record<string, string> | undefined {
  if (!headers) return undefined;

  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || value === null || typeof value === 'function') continue;
    if (SENSITIVE_HEADERS.includes(key.toLowerCase())) {
      sanitized[key] = 'REDACTED';
    } else {
      sanitized[key] = Array.isArray(value) ? value.map(String).join(', ') : String(value);
    }
  }

  return sanitized;
}

/**
 * Render a URL without its userinfo
 */
export function sanitizeUrlForLog(url: URL): string {
  if (!url.username && !url.password) return url.toString();
  const copy = new URL(url);
  copy.username = '';
  copy.password = '';
  return copy.toString();
}

/**
 * Create a safe log object from an error
 */
export function errorToLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const out: Record<string, unknown> = {
      type: error.name,
      message: error.message,
    };
    if ('category' in error) out.category = error.category;
    if (error.cause !== undefined) out.cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
    return out;
  }

  if (typeof error === 'object' && error !== null) {
    return { type: 'object', value: serializeForLog(error) };
  }

  return {
    type: typeof error,
    message: String(error),
  };
}
