/** Result of reading an `Authorization` header. */
export type BearerExtraction =
  | { status: 'absent' }
  | { status: 'malformed' }
  | { status: 'present'; token: string };

/**
 * Checks the compact JWS shape: exactly three non-empty, dot-separated segments.
 */
export function hasCompactJwsShape(token: string): boolean {
  const segments = token.split('.');
  return segments.length === 3 && segments.every((segment) => segment.length > 0);
}

/**
 * Extracts a bearer token from an `Authorization` header value.
 *
 * A missing header or a scheme other than `Bearer` counts as no credential at
 * all; a `Bearer` header with a missing, split or non-JWS token is malformed.
 *
 * @example
 * ```typescript
 * extractBearerToken('Basic abc123'); // { status: 'absent' }
 * extractBearerToken('Bearer a.b'); // { status: 'malformed' }
 * ```
 */
export function extractBearerToken(header: string | null | undefined): BearerExtraction {
  if (!header) {
    return { status: 'absent' };
  }

  const parts = header.trim().split(/\s+/);
  if (parts[0]?.toLowerCase() !== 'bearer') {
    return { status: 'absent' };
  }

  const token = parts[1];
  if (parts.length !== 2 || token === undefined || !hasCompactJwsShape(token)) {
    return { status: 'malformed' };
  }

  return { status: 'present', token };
}
