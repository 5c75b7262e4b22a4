import type { Logger } from 'pino';

/** How the service authenticates itself at the token endpoint. */
export type ClientAuthentication =
  | {
      /** Confidential client secret sent as form fields */
      method: 'client_secret';
      clientSecret: string;
    }
  | {
      /** RFC 7523 signed client assertion */
      method: 'private_key_jwt';
      /** RS256 private key registered with the provider */
      privateKey: CryptoKey;
      /** Key identifier for the assertion header (defaults to 'main') */
      keyId?: string;
    };

/**
 * Configuration for obtaining service-to-service access tokens with the
 * OAuth2 client credentials grant.
 */
export interface ServiceTokenConfig {
  /** Realm issuer; the token endpoint defaults to `${issuer}/protocol/openid-connect/token` */
  issuer: string;

  clientId: string;

  authentication: ClientAuthentication;

  /** Explicit token endpoint, overriding the one derived from `issuer` */
  tokenUrl?: string;

  /** Space-separated scopes to request */
  scope?: string;

  /** Seconds before `expires_in` at which a cached token is replaced (defaults to 30) */
  expirySkewSeconds?: number;

  /** Token request deadline in milliseconds (defaults to 5000) */
  timeoutMs?: number;

  fetch?: typeof fetch;

  logger?: Logger;
}
