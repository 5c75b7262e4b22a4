import type { Logger } from 'pino';

/** Tuning for the signing key cache. */
export interface KeyCacheOptions {
  /** Timeout for a single JWKS request in milliseconds (defaults to 5000) */
  fetchTimeoutMs?: number;
  /** Age after which the key set is refetched on next use (defaults to 1 hour) */
  refreshIntervalMs?: number;
  /** Minimum time between forced refreshes on unknown key ids (defaults to 30 seconds) */
  refreshCooldownMs?: number;
}

/**
 * Configuration for a TokenVerifier and the AuthorizationGate next to it.
 */
export interface VerifierConfig {
  /** Expected `iss` claim, e.g. 'https://sso.example.com/realms/myapp' */
  issuer: string;

  /** Audience that must be present in the `aud` claim (Keycloak's default is 'account') */
  audience: string;

  /** This service's client identifier, used to look up client roles in `resource_access` */
  clientId: string;

  /** JWKS endpoint (defaults to `${issuer}/protocol/openid-connect/certs`) */
  jwksUrl?: string;

  /** Accepted signing algorithms (defaults to ['RS256']) */
  algorithms?: string[];

  /** Leeway applied to `exp` and `nbf` checks, in seconds (defaults to 0) */
  clockToleranceSeconds?: number;

  keys?: KeyCacheOptions;

  /** Fetch implementation for the JWKS request (defaults to global fetch) */
  fetch?: typeof fetch;

  /** Optional pino logger */
  logger?: Logger;
}
