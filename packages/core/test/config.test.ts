import { describe, expect, it } from 'vitest';

import { loadConfigFromEnv } from '../src/utils/config.js';

const baseEnv = {
  KEYCLOAK_URL: 'https://sso.example.com/',
  KEYCLOAK_REALM: 'myapp',
  KEYCLOAK_CLIENT_ID: 'todo-api',
};

describe('loadConfigFromEnv', () => {
  it('derives the issuer and JWKS URL and applies defaults', () => {
    expect(loadConfigFromEnv(baseEnv)).toEqual({
      issuer: 'https://sso.example.com/realms/myapp',
      audience: 'account',
      clientId: 'todo-api',
      jwksUrl: 'https://sso.example.com/realms/myapp/protocol/openid-connect/certs',
      algorithms: ['RS256'],
      clockToleranceSeconds: 0,
      keys: {
        fetchTimeoutMs: 5000,
        refreshIntervalMs: 3_600_000,
        refreshCooldownMs: 30_000,
      },
    });
  });

  it('reads optional overrides', () => {
    const config = loadConfigFromEnv({
      ...baseEnv,
      KEYCLOAK_AUDIENCE: 'todo-api',
      JWKS_FETCH_TIMEOUT_MS: '2000',
      JWKS_REFRESH_COOLDOWN_MS: '0',
      JWT_CLOCK_TOLERANCE_SECONDS: '30',
      JWT_ALGORITHMS: 'RS256, ES256',
    });

    expect(config.audience).toBe('todo-api');
    expect(config.keys).toMatchObject({ fetchTimeoutMs: 2000, refreshCooldownMs: 0 });
    expect(config.clockToleranceSeconds).toBe(30);
    expect(config.algorithms).toEqual(['RS256', 'ES256']);
  });

  it('names every missing variable', () => {
    expect(() => loadConfigFromEnv({ KEYCLOAK_URL: 'https://sso.example.com' })).toThrow(
      '[Config] Invalid environment: KEYCLOAK_REALM: Invalid input: expected string, received undefined; ' +
        'KEYCLOAK_CLIENT_ID: Invalid input: expected string, received undefined',
    );
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => loadConfigFromEnv({ ...baseEnv, JWKS_FETCH_TIMEOUT_MS: 'soon' })).toThrow(
      'JWKS_FETCH_TIMEOUT_MS',
    );
  });

  it('rejects an empty algorithm list', () => {
    expect(() => loadConfigFromEnv({ ...baseEnv, JWT_ALGORITHMS: ' , ' })).toThrow(
      'JWT_ALGORITHMS: at least one algorithm is required',
    );
  });
});
