import { SignJWT } from 'jose';
import type { Logger } from 'pino';

import { formatError } from '../errors/authError.js';
import type { ServiceTokenConfig } from '../interfaces/serviceTokenConfig.js';
import { OAuthErrorResponseSchema, ServiceTokenResponseSchema } from '../schemas/index.js';
import { tokenUrl } from '../utils/keycloakUrls.js';
import { resolveLogger } from '../utils/logger.js';
import { providerFetch } from '../utils/providerFetch.js';

/** Failure to obtain a service token. Never carries the client secret or a token. */
export class ServiceTokenError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ServiceTokenError';
  }
}

/**
 * Obtains access tokens for service-to-service calls using the OAuth2 client
 * credentials grant, authenticating with a client secret or a signed JWT
 * client assertion (RFC 7523).
 *
 * Tokens are cached until shortly before they expire; concurrent callers share
 * one token request.
 *
 * @example
 * ```typescript
 * const serviceTokens = new ServiceTokenService({
 *   issuer: 'https://sso.example.com/realms/myapp',
 *   clientId: 'todo-api',
 *   authentication: { method: 'client_secret', clientSecret: process.env.CLIENT_SECRET ?? '' },
 * });
 *
 * const token = await serviceTokens.getServiceToken();
 * await fetch(url, { headers: { Authorization: `Bearer ${token}` } });
 * ```
 */
export class ServiceTokenService {
  private cached?: { accessToken: string; expiresAt: number };
  private inflight?: Promise<string>;
  private logger: Logger;

  constructor(private config: ServiceTokenConfig) {
    this.logger = resolveLogger(config.logger);
  }

  get tokenUrl(): string {
    return this.config.tokenUrl ?? tokenUrl(this.config.issuer);
  }

  /**
   * Returns a cached access token, requesting a new one when none is cached
   * or the cached one is about to expire.
   *
   * @throws {ServiceTokenError} When the token request fails
   */
  getServiceToken(): Promise<string> {
    if (this.cached && this.cached.expiresAt > Date.now()) {
      return Promise.resolve(this.cached.accessToken);
    }

    if (!this.inflight) {
      this.inflight = this.requestToken().finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  /** Forgets the cached token, e.g. after the downstream service rejected it. */
  clear(): void {
    this.cached = undefined;
  }

  /**
   * Creates a signed JWT client assertion for the token endpoint.
   *
   * @returns Signed RS256 assertion valid for five minutes
   * @throws {Error} When the client is not configured for `private_key_jwt`
   */
  async createClientAssertion(): Promise<string> {
    const { authentication, clientId } = this.config;
    if (authentication.method !== 'private_key_jwt') {
      throw new Error('[ServiceToken] Client assertions require private_key_jwt authentication');
    }

    const now = Math.floor(Date.now() / 1000);
    return await new SignJWT({
      iss: clientId,
      sub: clientId,
      aud: this.tokenUrl,
      iat: now,
      exp: now + 300,
      jti: crypto.randomUUID(),
    })
      .setProtectedHeader({
        alg: 'RS256',
        kid: authentication.keyId ?? 'main',
        typ: 'JWT',
      })
      .sign(authentication.privateKey);
  }

  private async requestToken(): Promise<string> {
    const { authentication, clientId, scope } = this.config;

    const body = new URLSearchParams({ grant_type: 'client_credentials', client_id: clientId });
    if (authentication.method === 'client_secret') {
      body.set('client_secret', authentication.clientSecret);
    } else {
      body.set('client_assertion_type', 'urn:ietf:params:oauth:client-assertion-type:jwt-bearer');
      body.set('client_assertion', await this.createClientAssertion());
    }
    if (scope) {
      body.set('scope', scope);
    }

    let response: Response;
    try {
      response = await providerFetch(
        this.tokenUrl,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body,
        },
        { timeoutMs: this.config.timeoutMs ?? 5000, fetch: this.config.fetch },
      );
    } catch (error) {
      throw new ServiceTokenError(`Token request failed: ${formatError(error)}`, undefined, {
        cause: error,
      });
    }

    const payload: unknown = await response.json().catch(() => undefined);

    if (!response.ok) {
      const oauthError = OAuthErrorResponseSchema.safeParse(payload);
      const detail = oauthError.success ? ` (${oauthError.data.error})` : '';
      this.logger.warn({ clientId, status: response.status }, 'service token request rejected');
      throw new ServiceTokenError(
        `Token request failed: ${response.status} ${response.statusText}${detail}`,
        response.status,
      );
    }

    const tokenData = ServiceTokenResponseSchema.safeParse(payload);
    if (!tokenData.success) {
      throw new ServiceTokenError('Token response missing access_token', response.status);
    }

    const { access_token, expires_in } = tokenData.data;
    const skew = this.config.expirySkewSeconds ?? 30;
    this.cached =
      expires_in !== undefined
        ? { accessToken: access_token, expiresAt: Date.now() + (expires_in - skew) * 1000 }
        : undefined;

    this.logger.info({ clientId, expiresIn: expires_in }, 'obtained service token');
    return access_token;
  }
}
