import { importJWK } from 'jose';
import type { Logger } from 'pino';

import { AuthError, formatError, isAuthError } from '../errors/authError.js';
import type { SigningKey, SigningKeySet } from '../interfaces/signingKey.js';
import type { KeyCacheOptions } from '../interfaces/verifierConfig.js';
import { JWKSResponseSchema } from '../schemas/index.js';
import { DEFAULT_ALGORITHMS, resolveKeyAlgorithm } from '../utils/algorithms.js';
import { resolveLogger } from '../utils/logger.js';
import { providerFetch } from '../utils/providerFetch.js';

export interface SigningKeyCacheOptions extends KeyCacheOptions {
  /** JWKS endpoint of the identity provider */
  jwksUrl: string;
  /** Algorithms a key may be pinned to (defaults to ['RS256']) */
  algorithms?: string[];
  fetch?: typeof fetch;
  logger?: Logger;
}

/**
 * In-memory cache of the identity provider's signing keys.
 *
 * Snapshots are immutable and swapped in with a single assignment. Concurrent
 * loads share one outbound request. A snapshot older than the refresh interval
 * is refetched on next use; if that refetch fails the old snapshot is kept.
 *
 * @example
 * ```typescript
 * const cache = new SigningKeyCache({
 *   jwksUrl: 'https://sso.example.com/realms/myapp/protocol/openid-connect/certs',
 * });
 * const keySet = await cache.getKeySet();
 * const key = keySet.keys.get(kid);
 * ```
 */
export class SigningKeyCache {
  private current?: SigningKeySet;
  private inflight?: Promise<SigningKeySet>;
  private lastAttemptAt = 0;
  private logger: Logger;
  private algorithms: string[];
  private fetchTimeoutMs: number;
  private refreshIntervalMs: number;
  private refreshCooldownMs: number;

  constructor(private options: SigningKeyCacheOptions) {
    this.logger = resolveLogger(options.logger);
    this.algorithms = options.algorithms ?? DEFAULT_ALGORITHMS;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 5000;
    this.refreshIntervalMs = options.refreshIntervalMs ?? 60 * 60 * 1000;
    this.refreshCooldownMs = options.refreshCooldownMs ?? 30 * 1000;
  }

  /**
   * Returns the current key set, fetching it when absent or past the refresh interval.
   *
   * @throws {AuthError} `KeyRetrievalFailed` when no key set is cached and the fetch fails
   */
  async getKeySet(): Promise<SigningKeySet> {
    const snapshot = this.current;
    if (!snapshot) {
      return this.load();
    }

    const age = Date.now() - snapshot.fetchedAt;
    if (age < this.refreshIntervalMs || !this.canRefresh()) {
      return snapshot;
    }

    try {
      return await this.load();
    } catch (error) {
      this.logger.warn(
        { jwksUrl: this.options.jwksUrl, ageMs: age, error: formatError(error) },
        'JWKS refresh failed, serving previous key set',
      );
      return snapshot;
    }
  }

  /**
   * Fetches the key set now, joining a fetch already in progress.
   *
   * @throws {AuthError} `KeyRetrievalFailed` when the fetch fails
   */
  refresh(): Promise<SigningKeySet> {
    return this.load();
  }

  /**
   * Refetches for an unknown key id. Joins a fetch already in progress, starts
   * one when the cooldown has elapsed, and otherwise returns the current key set.
   *
   * @throws {AuthError} `KeyRetrievalFailed` when the fetch fails
   */
  async refreshIfAllowed(): Promise<SigningKeySet | undefined> {
    if (this.inflight) {
      return this.inflight;
    }
    if (this.canRefresh()) {
      return this.load();
    }
    return this.current;
  }

  /** Whether the cooldown since the last fetch attempt has elapsed. */
  canRefresh(): boolean {
    return Date.now() - this.lastAttemptAt >= this.refreshCooldownMs;
  }

  /** Drops the cached key set; the next call fetches a fresh one. */
  clear(): void {
    this.current = undefined;
    this.lastAttemptAt = 0;
  }

  private load(): Promise<SigningKeySet> {
    if (!this.inflight) {
      this.inflight = this.fetchKeySet()
        .then((keySet) => {
          this.current = keySet;
          return keySet;
        })
        .finally(() => {
          this.inflight = undefined;
        });
    }
    return this.inflight;
  }

  private async fetchKeySet(): Promise<SigningKeySet> {
    this.lastAttemptAt = Date.now();
    const { jwksUrl } = this.options;

    let body: unknown;
    try {
      const response = await providerFetch(
        jwksUrl,
        {},
        { timeoutMs: this.fetchTimeoutMs, fetch: this.options.fetch },
      );
      if (!response.ok) {
        throw new AuthError(
          'KeyRetrievalFailed',
          `JWKS request failed: ${response.status} ${response.statusText}`,
        );
      }
      body = await response.json();
    } catch (error) {
      if (isAuthError(error)) throw error;
      throw new AuthError('KeyRetrievalFailed', `JWKS request failed: ${formatError(error)}`, {
        cause: error,
      });
    }

    const parsed = JWKSResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError('KeyRetrievalFailed', 'JWKS response is not a valid key set');
    }

    const keys = new Map<string, SigningKey>();
    for (const jwk of parsed.data.keys) {
      if (!jwk.kid || jwk.use === 'enc') continue;

      const alg = resolveKeyAlgorithm(jwk, this.algorithms);
      if (!alg) {
        this.logger.debug({ kid: jwk.kid, kty: jwk.kty, alg: jwk.alg }, 'skipping JWK with disallowed algorithm');
        continue;
      }

      try {
        keys.set(jwk.kid, { kid: jwk.kid, alg, key: await importJWK(jwk, alg) });
      } catch (error) {
        this.logger.warn({ kid: jwk.kid, error: formatError(error) }, 'skipping JWK that failed to import');
      }
    }

    if (keys.size === 0) {
      throw new AuthError('KeyRetrievalFailed', 'JWKS response contains no usable signing keys');
    }

    this.logger.info({ jwksUrl, keyIds: [...keys.keys()] }, 'fetched signing keys');
    return { keys, fetchedAt: Date.now() };
  }
}
