import type { Logger } from 'pino';

import { AuthError, type AuthErrorKind } from '../errors/authError.js';
import type {
  AuthDecision,
  AuthDenial,
  Credential,
  PolicyDecision,
} from '../interfaces/authDecision.js';
import type { ClaimSet, Policy } from '../schemas/index.js';
import { resolveLogger } from '../utils/logger.js';

/**
 * Per-request input for policies that depend on the resource being accessed.
 */
export interface PolicyContext {
  /** Subject id of the resource owner, for `owner-or-role` policies */
  resourceOwnerId?: string;
}

function deny(kind: AuthErrorKind, message?: string): AuthDenial {
  const error = new AuthError(kind, message);
  return { allowed: false, reason: error.kind, status: error.status, message: error.message };
}

/**
 * Realm-wide roles plus roles scoped to the given client.
 */
export function collectRoles(claims: ClaimSet, clientId: string): {
  realmRoles: string[];
  clientRoles: string[];
} {
  return {
    realmRoles: claims.realm_access?.roles ?? [],
    clientRoles: claims.resource_access?.[clientId]?.roles ?? [],
  };
}

/**
 * Maps verified claims (or their absence) to allow/deny decisions for protected operations.
 *
 * @example
 * ```typescript
 * const gate = new AuthorizationGate({ clientId: 'todo-api' });
 * const credential = await verifier.safeVerify(token);
 *
 * const decision = gate.requireOwnerOrRole(credential, todo.ownerId, 'admin');
 * if (!decision.allowed) {
 *   return c.json({ error: decision.reason }, decision.status);
 * }
 * ```
 */
export class AuthorizationGate {
  private logger: Logger;

  constructor(private config: { clientId: string; logger?: Logger }) {
    this.logger = resolveLogger(config.logger);
  }

  /** Client whose `resource_access` roles count toward role checks. */
  get clientId(): string {
    return this.config.clientId;
  }

  /**
   * Allows any caller whose token verified.
   *
   * @returns `NoCredential` when no token was supplied, the verification
   * failure kind when it was rejected, otherwise allowed with its claims
   */
  requireAuthenticated(credential: Credential): AuthDecision {
    if (!credential) {
      return deny('NoCredential');
    }
    if (!credential.success) {
      const { error } = credential;
      return { allowed: false, reason: error.kind, status: error.status, message: error.message };
    }
    return { allowed: true, claims: credential.data };
  }

  /**
   * Allows authenticated callers holding `role` as a realm role or as a
   * client role of this service.
   */
  requireRole(credential: Credential, role: string): AuthDecision {
    const decision = this.requireAuthenticated(credential);
    if (!decision.allowed) {
      return decision;
    }

    if (this.hasRole(decision.claims, role)) {
      return decision;
    }

    this.logger.debug({ sub: decision.claims.sub, role }, 'role missing');
    return deny('InsufficientRole', `Role '${role}' required`);
  }

  /**
   * Allows the resource owner, or any caller holding `role` (e.g. an admin).
   *
   * @param resourceOwnerId - Subject id of the owner; undefined never matches
   */
  requireOwnerOrRole(
    credential: Credential,
    resourceOwnerId: string | undefined,
    role: string,
  ): AuthDecision {
    const decision = this.requireAuthenticated(credential);
    if (!decision.allowed) {
      return decision;
    }

    const { claims } = decision;
    if (resourceOwnerId !== undefined && claims.sub === resourceOwnerId) {
      return decision;
    }
    if (this.hasRole(claims, role)) {
      return decision;
    }

    this.logger.debug({ sub: claims.sub, role }, 'caller is neither owner nor role holder');
    return deny('Forbidden', `Only the owner or role '${role}' may access this resource`);
  }

  /**
   * Evaluates a route policy. Public routes are always allowed and carry the
   * caller's claims when a valid token was supplied.
   */
  evaluate(policy: Policy, credential: Credential, context: PolicyContext = {}): PolicyDecision {
    switch (policy.type) {
      case 'public':
        return credential?.success
          ? { allowed: true, claims: credential.data }
          : { allowed: true, claims: undefined };
      case 'authenticated':
        return this.requireAuthenticated(credential);
      case 'role':
        return this.requireRole(credential, policy.role);
      case 'owner-or-role':
        return this.requireOwnerOrRole(credential, context.resourceOwnerId, policy.role);
    }
  }

  private hasRole(claims: ClaimSet, role: string): boolean {
    const { realmRoles, clientRoles } = collectRoles(claims, this.config.clientId);
    return realmRoles.includes(role) || clientRoles.includes(role);
  }
}
