import type { AuthError, AuthErrorKind } from '../errors/authError.js';
import type { ClaimSet } from '../schemas/index.js';

/** Outcome of a verification attempt, shaped like zod's `safeParse` result. */
export type VerificationResult =
  | { success: true; data: ClaimSet }
  | { success: false; error: AuthError };

/**
 * What the authorization gate receives for a request: `undefined` when no
 * bearer token was supplied, otherwise the verification outcome.
 */
export type Credential = VerificationResult | undefined;

export interface AuthDenial {
  allowed: false;
  reason: AuthErrorKind;
  status: 401 | 403;
  message: string;
}

export type AuthDecision = { allowed: true; claims: ClaimSet } | AuthDenial;

/** Public routes allow anonymous callers, so an allowed decision may carry no claims. */
export type PolicyDecision = AuthDecision | { allowed: true; claims: undefined };
