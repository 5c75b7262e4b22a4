import {
  type AuthDenial,
  AuthorizationGate,
  type ClaimSet,
  formatError,
  parsePolicy,
  type Policy,
  TokenVerifier,
  type VerifierConfig,
} from '@keygate/core';
import type { Context, MiddlewareHandler } from 'hono';
import type { Logger } from 'pino';

/**
 * Context variables available behind bearer auth middleware.
 */
export interface BearerAuthVariables {
  /** Verified claims of the caller; absent on public routes without a valid token */
  claims?: ClaimSet;
}

export type BearerAuthEnv = { Variables: BearerAuthVariables };

export interface PolicyOptions {
  /**
   * Looks up the owner's subject id of the resource a request targets.
   * Required for `owner-or-role` policies; return undefined when there is no owner.
   */
  resolveOwner?: (c: Context<BearerAuthEnv>) => string | undefined | Promise<string | undefined>;
}

export interface BearerAuth {
  verifier: TokenVerifier;
  gate: AuthorizationGate;
  /**
   * Creates middleware enforcing a route policy.
   * @param policy - A Policy, or its declaration such as 'role:admin'
   */
  requirePolicy(
    policy: Policy | string,
    options?: PolicyOptions,
  ): MiddlewareHandler<BearerAuthEnv>;
}

/**
 * Writes the JSON error response for a denied request. 401 responses carry a
 * `WWW-Authenticate` challenge (RFC 6750); the body names the failure kind only.
 */
export function denialResponse(c: Context, denial: AuthDenial, realm: string): Response {
  if (denial.status === 401) {
    const params = [`realm="${realm}"`];
    if (denial.reason !== 'NoCredential') {
      params.push('error="invalid_token"');
    }
    c.header('WWW-Authenticate', `Bearer ${params.join(', ')}`);
  }
  return c.json({ error: denial.reason, message: denial.message }, denial.status);
}

/**
 * Composes a token verifier and authorization gate into per-route Hono middleware.
 *
 * @example
 * ```typescript
 * const auth = createBearerAuth({ verifier, gate, logger });
 *
 * app.get('/api/public', auth.requirePolicy('public'), handler);
 * app.get('/admin', auth.requirePolicy('role:admin'), handler);
 * app.delete(
 *   '/api/todos/:id',
 *   auth.requirePolicy('owner-or-role:admin', {
 *     resolveOwner: (c) => todos.get(c.req.param('id'))?.userId,
 *   }),
 *   handler,
 * );
 * ```
 */
export function createBearerAuth(config: {
  verifier: TokenVerifier;
  gate: AuthorizationGate;
  logger?: Logger;
}): BearerAuth {
  const { verifier, gate, logger } = config;

  function requirePolicy(
    policy: Policy | string,
    options: PolicyOptions = {},
  ): MiddlewareHandler<BearerAuthEnv> {
    const parsed = typeof policy === 'string' ? parsePolicy(policy) : policy;
    const { resolveOwner } = options;
    if (parsed.type === 'owner-or-role' && !resolveOwner) {
      throw new Error('[Policy] owner-or-role policies require a resolveOwner option');
    }

    return async (c, next) => {
      if (parsed.type === 'public') {
        await next();
        return;
      }

      let claims: ClaimSet | undefined;
      try {
        const credential = await verifier.authenticate(c.req.header('Authorization'));
        const resourceOwnerId =
          parsed.type === 'owner-or-role' && credential?.success && resolveOwner
            ? await resolveOwner(c)
            : undefined;

        const decision = gate.evaluate(parsed, credential, { resourceOwnerId });
        if (!decision.allowed) {
          logger?.info(
            { reason: decision.reason, path: c.req.path, method: c.req.method },
            'request denied',
          );
          return denialResponse(c, decision, verifier.issuer);
        }
        claims = decision.claims;
      } catch (error) {
        logger?.error({ error: formatError(error), path: c.req.path }, 'bearer auth error');
        return c.json({ error: 'Internal server error' }, 500);
      }

      if (claims) {
        c.set('claims', claims);
      }
      await next();
    };
  }

  return { verifier, gate, requirePolicy };
}

/**
 * Builds a verifier and gate from one configuration and wraps them in bearer auth.
 */
export function bearerAuthFromConfig(config: VerifierConfig): BearerAuth {
  return createBearerAuth({
    verifier: new TokenVerifier(config),
    gate: new AuthorizationGate({ clientId: config.clientId, logger: config.logger }),
    logger: config.logger,
  });
}
