import * as z from 'zod';

export const EnvironmentSchema = z.object({
  KEYCLOAK_URL: z.url(),
  KEYCLOAK_REALM: z.string().min(1),
  KEYCLOAK_CLIENT_ID: z.string().min(1),
  KEYCLOAK_AUDIENCE: z.string().min(1).default('account'),
  JWKS_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  JWKS_REFRESH_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  JWKS_REFRESH_COOLDOWN_MS: z.coerce.number().int().nonnegative().default(30 * 1000),
  JWT_CLOCK_TOLERANCE_SECONDS: z.coerce.number().int().nonnegative().default(0),
  JWT_ALGORITHMS: z
    .string()
    .default('RS256')
    .transform((value) =>
      value
        .split(',')
        .map((alg) => alg.trim())
        .filter((alg) => alg.length > 0),
    )
    .pipe(z.array(z.string()).min(1, 'at least one algorithm is required')),
});

export type Environment = z.infer<typeof EnvironmentSchema>;
