/**
 * Closed set of authentication and authorization failure kinds.
 * Each kind is reported on its own and never merged into a generic bucket.
 */
export const AUTH_ERROR_KINDS = [
  'MalformedToken',
  'KeyRetrievalFailed',
  'UnknownSigningKey',
  'ExpiredToken',
  'TokenNotYetValid',
  'IssuerMismatch',
  'AudienceMismatch',
  'NoCredential',
  'InsufficientRole',
  'Forbidden',
] as const;

export type AuthErrorKind = (typeof AUTH_ERROR_KINDS)[number];

/** HTTP status each kind maps to: 401 for authentication, 403 for authorization. */
export const AUTH_ERROR_STATUS: Record<AuthErrorKind, 401 | 403> = {
  MalformedToken: 401,
  KeyRetrievalFailed: 401,
  UnknownSigningKey: 401,
  ExpiredToken: 401,
  TokenNotYetValid: 401,
  IssuerMismatch: 401,
  AudienceMismatch: 401,
  NoCredential: 401,
  InsufficientRole: 403,
  Forbidden: 403,
};

const DEFAULT_MESSAGES: Record<AuthErrorKind, string> = {
  MalformedToken: 'Token is malformed',
  KeyRetrievalFailed: 'Signing keys could not be retrieved',
  UnknownSigningKey: 'Token was not signed by a known signing key',
  ExpiredToken: 'Token has expired',
  TokenNotYetValid: 'Token is not valid yet',
  IssuerMismatch: 'Token issuer is not accepted',
  AudienceMismatch: 'Token audience is not accepted',
  NoCredential: 'No bearer token provided',
  InsufficientRole: 'Required role is missing',
  Forbidden: 'Access to this resource is forbidden',
};

/**
 * Typed failure raised by token verification and authorization.
 *
 * Messages name the failure and must never include the raw token or key material.
 *
 * @example
 * ```typescript
 * try {
 *   await verifier.verify(token);
 * } catch (error) {
 *   if (isAuthError(error) && error.retryable) {
 *     // identity provider unavailable, retry later
 *   }
 * }
 * ```
 */
export class AuthError extends Error {
  readonly kind: AuthErrorKind;
  readonly status: 401 | 403;

  constructor(kind: AuthErrorKind, message?: string, options?: { cause?: unknown }) {
    super(message ?? DEFAULT_MESSAGES[kind], options);
    this.name = 'AuthError';
    this.kind = kind;
    this.status = AUTH_ERROR_STATUS[kind];
  }

  /** Only key retrieval reflects transient provider unavailability. */
  get retryable(): boolean {
    return this.kind === 'KeyRetrievalFailed';
  }
}

export function isAuthError(value: unknown): value is AuthError {
  return value instanceof AuthError;
}

/**
 * Formats an unknown thrown value into a log-safe message string.
 *
 * @param error - Error, string, or any other thrown value
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
