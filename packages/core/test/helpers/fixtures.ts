import { exportJWK, generateKeyPair, type JWK, type JWTPayload, SignJWT } from 'jose';
import { vi } from 'vitest';

import type { ClaimSet } from '../../src/schemas/index.js';

export const ISSUER = 'https://sso.example.com/realms/myapp';
export const AUDIENCE = 'account';
export const CLIENT_ID = 'todo-api';
export const JWKS_URL = `${ISSUER}/protocol/openid-connect/certs`;

export interface TestSigningKey {
  kid: string;
  alg: string;
  privateKey: CryptoKey;
  publicKey: CryptoKey;
  publicJwk: JWK;
}

/** Generates a real key pair and its published JWK. */
export async function createSigningKey(kid: string, alg = 'RS256'): Promise<TestSigningKey> {
  const { privateKey, publicKey } = await generateKeyPair(alg);
  const publicJwk: JWK = { ...(await exportJWK(publicKey)), kid, alg, use: 'sig' };
  return { kid, alg, privateKey, publicKey, publicJwk };
}

export const nowSeconds = (): number => Math.floor(Date.now() / 1000);

/**
 * Signs an access token shaped like Keycloak's, valid for five minutes.
 */
export async function mintToken(
  key: TestSigningKey,
  claims: JWTPayload = {},
  header: { alg?: string; kid?: string } = {},
): Promise<string> {
  const now = nowSeconds();
  return new SignJWT({
    sub: 'user-1',
    iss: ISSUER,
    aud: AUDIENCE,
    iat: now,
    exp: now + 300,
    preferred_username: 'alice',
    realm_access: { roles: ['user'] },
    ...claims,
  })
    .setProtectedHeader({ alg: header.alg ?? key.alg, kid: header.kid ?? key.kid, typ: 'JWT' })
    .sign(key.privateKey);
}

export function jwksResponse(keys: JWK[]): Response {
  return new Response(JSON.stringify({ keys }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** Fetch stub answering every request with the given keys. */
export function createJwksFetch(keys: JWK[]) {
  return vi.fn<typeof fetch>(async () => jwksResponse(keys));
}

export const createClaims = (overrides: Partial<ClaimSet> = {}): ClaimSet => ({
  sub: 'user-1',
  iss: ISSUER,
  aud: AUDIENCE,
  exp: nowSeconds() + 300,
  preferred_username: 'alice',
  realm_access: { roles: ['user'] },
  ...overrides,
});
