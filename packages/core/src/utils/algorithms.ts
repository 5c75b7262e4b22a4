import type { JWKSKey } from '../schemas/index.js';

export const DEFAULT_ALGORITHMS = ['RS256'];

const EC_CURVE_ALGORITHMS: Record<string, string> = {
  'P-256': 'ES256',
  'P-384': 'ES384',
  'P-521': 'ES512',
};

/**
 * Determines the algorithm a published key may verify: its `alg` member when
 * present, otherwise the conventional algorithm for its key type and curve.
 *
 * @returns The pinned algorithm, or undefined when it is not in `allowed`
 */
export function resolveKeyAlgorithm(jwk: JWKSKey, allowed: string[]): string | undefined {
  let alg = jwk.alg;
  if (!alg) {
    if (jwk.kty === 'RSA') alg = 'RS256';
    else if (jwk.kty === 'EC' && jwk.crv) alg = EC_CURVE_ALGORITHMS[jwk.crv];
    else if (jwk.kty === 'OKP' && jwk.crv === 'Ed25519') alg = 'EdDSA';
  }
  return alg && allowed.includes(alg) ? alg : undefined;
}
