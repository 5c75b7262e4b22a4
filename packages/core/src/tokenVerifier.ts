import { compactVerify, decodeProtectedHeader, errors } from 'jose';
import type { Logger } from 'pino';

import { AuthError, formatError, isAuthError } from './errors/authError.js';
import type { Credential, VerificationResult } from './interfaces/authDecision.js';
import type { SigningKey } from './interfaces/signingKey.js';
import type { VerifierConfig } from './interfaces/verifierConfig.js';
import { type ClaimSet, ClaimSetSchema } from './schemas/index.js';
import { SigningKeyCache } from './services/signingKeyCache.service.js';
import { extractBearerToken, hasCompactJwsShape } from './utils/bearerToken.js';
import { certsUrl } from './utils/keycloakUrls.js';
import { resolveLogger } from './utils/logger.js';

/** Per-call overrides for the expected issuer and audience. */
export interface ExpectedClaims {
  issuer?: string;
  audience?: string;
}

interface UntrustedHeader {
  alg: string;
  kid: string;
}

/**
 * Verifies bearer tokens issued by an OpenID Connect provider against its
 * published signing keys.
 *
 * Verification steps:
 * - Parse the protected header without trusting it (key id and algorithm)
 * - Look up the key id in the cached key set, refreshing once on a miss
 * - Verify the signature with the key's pinned algorithm only
 * - Check `exp`, `nbf`, `iss` and `aud`, in that order
 *
 * @example
 * ```typescript
 * const verifier = new TokenVerifier({
 *   issuer: 'https://sso.example.com/realms/myapp',
 *   audience: 'account',
 *   clientId: 'todo-api',
 *   logger: pino(),
 * });
 *
 * const result = await verifier.safeVerify(token);
 * if (result.success) {
 *   console.log(result.data.sub);
 * } else {
 *   console.log(result.error.kind);
 * }
 * ```
 */
export class TokenVerifier {
  private keyCache: SigningKeyCache;
  private logger: Logger;

  /**
   * Creates a new TokenVerifier.
   *
   * @param config - Issuer, audience and key cache settings
   * @param keyCache - Key cache to use instead of one built from `config`
   */
  constructor(
    private config: VerifierConfig,
    keyCache?: SigningKeyCache,
  ) {
    this.logger = resolveLogger(config.logger);
    this.keyCache =
      keyCache ??
      new SigningKeyCache({
        ...config.keys,
        jwksUrl: config.jwksUrl ?? certsUrl(config.issuer),
        algorithms: config.algorithms,
        fetch: config.fetch,
        logger: this.logger,
      });
  }

  get issuer(): string {
    return this.config.issuer;
  }

  /**
   * Verifies a compact JWS bearer token and returns its claims.
   *
   * @param token - Raw token, without the `Bearer ` prefix
   * @param expected - Overrides for the configured issuer and audience
   * @returns Validated claim set
   * @throws {AuthError} With the kind of the first check that failed
   */
  async verify(token: string, expected: ExpectedClaims = {}): Promise<ClaimSet> {
    try {
      return await this.verifyToken(token, expected);
    } catch (error) {
      if (isAuthError(error)) {
        this.logger.warn({ kind: error.kind, reason: error.message }, 'token verification failed');
      }
      throw error;
    }
  }

  /**
   * Verifies a token without throwing for authentication failures.
   *
   * @returns `{ success: true, data }` with the claims, or `{ success: false, error }`
   */
  async safeVerify(token: string, expected: ExpectedClaims = {}): Promise<VerificationResult> {
    try {
      return { success: true, data: await this.verify(token, expected) };
    } catch (error) {
      if (isAuthError(error)) {
        return { success: false, error };
      }
      throw error;
    }
  }

  /**
   * Reads an `Authorization` header into the credential the authorization gate consumes.
   *
   * @param header - Raw header value
   * @returns `undefined` when no bearer token was supplied, otherwise the verification result
   */
  async authenticate(header: string | null | undefined): Promise<Credential> {
    const extracted = extractBearerToken(header);
    switch (extracted.status) {
      case 'absent':
        return undefined;
      case 'malformed':
        return {
          success: false,
          error: new AuthError('MalformedToken', 'Authorization header must be: Bearer <token>'),
        };
      case 'present':
        return this.safeVerify(extracted.token);
    }
  }

  /**
   * Fetches the provider's signing keys now, e.g. at startup to check connectivity
   * or when a key rotation is announced.
   *
   * @throws {AuthError} `KeyRetrievalFailed` when the keys cannot be fetched
   */
  async refreshKeys(): Promise<void> {
    await this.keyCache.refresh();
  }

  private async verifyToken(token: string, expected: ExpectedClaims): Promise<ClaimSet> {
    const header = readUntrustedHeader(token);
    const key = await this.findSigningKey(header.kid);

    if (header.alg !== key.alg) {
      throw new AuthError('MalformedToken', 'Token algorithm does not match its signing key');
    }

    const claims = await verifySignature(token, key);
    this.validateClaims(claims, expected);

    this.logger.debug({ sub: claims.sub, kid: key.kid }, 'token verified');
    return claims;
  }

  private async findSigningKey(kid: string): Promise<SigningKey> {
    // a single snapshot is used per lookup; a refresh swaps in a new one
    const keySet = await this.keyCache.getKeySet();
    const key = keySet.keys.get(kid);
    if (key) {
      return key;
    }

    this.logger.info({ kid }, 'unknown key id, refreshing signing keys');
    const latest = await this.keyCache.refreshIfAllowed();
    const rotated = latest?.keys.get(kid);
    if (rotated) {
      return rotated;
    }

    this.logger.debug({ kid }, 'no signing key for key id');
    throw new AuthError('UnknownSigningKey');
  }

  private validateClaims(claims: ClaimSet, expected: ExpectedClaims): void {
    const tolerance = this.config.clockToleranceSeconds ?? 0;
    const now = Math.floor(Date.now() / 1000);

    if (claims.exp <= now - tolerance) {
      throw new AuthError('ExpiredToken');
    }

    if (claims.nbf !== undefined && claims.nbf > now + tolerance) {
      throw new AuthError('TokenNotYetValid');
    }

    const issuer = expected.issuer ?? this.config.issuer;
    if (claims.iss !== issuer) {
      throw new AuthError('IssuerMismatch');
    }

    const audience = expected.audience ?? this.config.audience;
    const audiences = typeof claims.aud === 'string' ? [claims.aud] : (claims.aud ?? []);
    if (!audiences.includes(audience)) {
      throw new AuthError('AudienceMismatch');
    }
  }
}

function readUntrustedHeader(token: string): UntrustedHeader {
  if (!hasCompactJwsShape(token)) {
    throw new AuthError('MalformedToken', 'Token must have three segments');
  }

  let header: ReturnType<typeof decodeProtectedHeader>;
  try {
    header = decodeProtectedHeader(token);
  } catch (error) {
    throw new AuthError('MalformedToken', 'Token header cannot be decoded', { cause: error });
  }

  if (typeof header.alg !== 'string' || header.alg.length === 0) {
    throw new AuthError('MalformedToken', 'Token header has no algorithm');
  }
  if (typeof header.kid !== 'string' || header.kid.length === 0) {
    throw new AuthError('MalformedToken', 'Token header has no key id');
  }

  return { alg: header.alg, kid: header.kid };
}

async function verifySignature(token: string, key: SigningKey): Promise<ClaimSet> {
  let payload: Uint8Array;
  try {
    ({ payload } = await compactVerify(token, key.key, { algorithms: [key.alg] }));
  } catch (error) {
    if (error instanceof errors.JWSSignatureVerificationFailed) {
      throw new AuthError('UnknownSigningKey', 'Token signature does not match a known signing key', {
        cause: error,
      });
    }
    throw new AuthError('MalformedToken', `Token cannot be verified: ${formatError(error)}`, {
      cause: error,
    });
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(new TextDecoder().decode(payload));
  } catch (error) {
    throw new AuthError('MalformedToken', 'Token payload is not JSON', { cause: error });
  }

  const result = ClaimSetSchema.safeParse(decoded);
  if (!result.success) {
    throw new AuthError('MalformedToken', 'Token claims are invalid');
  }
  return result.data;
}
