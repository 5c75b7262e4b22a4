import type { VerifierConfig } from '../interfaces/verifierConfig.js';
import { EnvironmentSchema } from '../schemas/index.js';

import { certsUrl, realmIssuer } from './keycloakUrls.js';

/**
 * Builds a VerifierConfig from environment variables.
 *
 * Required: `KEYCLOAK_URL`, `KEYCLOAK_REALM`, `KEYCLOAK_CLIENT_ID`.
 * Optional: `KEYCLOAK_AUDIENCE`, `JWKS_FETCH_TIMEOUT_MS`, `JWKS_REFRESH_INTERVAL_MS`,
 * `JWKS_REFRESH_COOLDOWN_MS`, `JWT_CLOCK_TOLERANCE_SECONDS`, `JWT_ALGORITHMS`.
 *
 * @param env - Variables to read (defaults to process.env)
 * @throws {Error} Listing every missing or invalid variable
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): VerifierConfig {
  const result = EnvironmentSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`[Config] Invalid environment: ${problems}`);
  }

  const vars = result.data;
  const issuer = realmIssuer(vars.KEYCLOAK_URL, vars.KEYCLOAK_REALM);

  return {
    issuer,
    audience: vars.KEYCLOAK_AUDIENCE,
    clientId: vars.KEYCLOAK_CLIENT_ID,
    jwksUrl: certsUrl(issuer),
    algorithms: vars.JWT_ALGORITHMS,
    clockToleranceSeconds: vars.JWT_CLOCK_TOLERANCE_SECONDS,
    keys: {
      fetchTimeoutMs: vars.JWKS_FETCH_TIMEOUT_MS,
      refreshIntervalMs: vars.JWKS_REFRESH_INTERVAL_MS,
      refreshCooldownMs: vars.JWKS_REFRESH_COOLDOWN_MS,
    },
  };
}
