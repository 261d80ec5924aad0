const REDACTED_KEYS = new Set(['password']);

/**
 * Copy of a request body with credential fields masked, for logging
 */
export function redactBody(body: unknown): unknown {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return body;
  }

  return Object.fromEntries(
    Object.entries(body).map(([key, value]) => [key, REDACTED_KEYS.has(key) ? '[redacted]' : value])
  );
}
