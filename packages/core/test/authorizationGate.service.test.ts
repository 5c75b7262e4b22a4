import { describe, expect, it } from 'vitest';

import { AuthError } from '../src/errors/authError.js';
import type { Credential } from '../src/interfaces/authDecision.js';
import { AuthorizationGate, collectRoles } from '../src/services/authorizationGate.service.js';

import { CLIENT_ID, createClaims } from './helpers/fixtures.js';

const verified = (overrides: Parameters<typeof createClaims>[0] = {}): Credential => ({
  success: true,
  data: createClaims(overrides),
});

const rejected = (error: AuthError): Credential => ({ success: false, error });

describe('AuthorizationGate', () => {
  const gate = new AuthorizationGate({ clientId: CLIENT_ID });

  describe('requireAuthenticated', () => {
    it('denies a request without a credential', () => {
      expect(gate.requireAuthenticated(undefined)).toEqual({
        allowed: false,
        reason: 'NoCredential',
        status: 401,
        message: 'No bearer token provided',
      });
    });

    it('passes the verification failure through', () => {
      const decision = gate.requireAuthenticated(rejected(new AuthError('ExpiredToken')));

      expect(decision).toEqual({
        allowed: false,
        reason: 'ExpiredToken',
        status: 401,
        message: 'Token has expired',
      });
    });

    it('allows a verified caller with its claims', () => {
      const credential = verified({ sub: 'user-7' });

      const decision = gate.requireAuthenticated(credential);

      expect(decision.allowed).toBe(true);
      expect(decision.allowed && decision.claims.sub).toBe('user-7');
    });
  });

  describe('requireRole', () => {
    it('allows a realm role', () => {
      const decision = gate.requireRole(verified({ realm_access: { roles: ['admin'] } }), 'admin');

      expect(decision.allowed).toBe(true);
    });

    it('allows a client role of this client', () => {
      const credential = verified({
        realm_access: { roles: [] },
        resource_access: { [CLIENT_ID]: { roles: ['admin'] } },
      });

      expect(gate.requireRole(credential, 'admin').allowed).toBe(true);
    });

    it('ignores client roles of other clients', () => {
      const credential = verified({
        realm_access: { roles: ['user'] },
        resource_access: { 'billing-api': { roles: ['admin'] } },
      });

      expect(gate.requireRole(credential, 'admin')).toEqual({
        allowed: false,
        reason: 'InsufficientRole',
        status: 403,
        message: "Role 'admin' required",
      });
    });

    it('treats a token without role claims as having no roles', () => {
      const credential = verified({ realm_access: undefined });

      expect(gate.requireRole(credential, 'user')).toMatchObject({
        allowed: false,
        reason: 'InsufficientRole',
      });
    });

    it('reports authentication failures before role checks', () => {
      expect(gate.requireRole(undefined, 'admin')).toMatchObject({
        reason: 'NoCredential',
        status: 401,
      });
    });
  });

  describe('requireOwnerOrRole', () => {
    it('allows the owner', () => {
      const decision = gate.requireOwnerOrRole(verified({ sub: 'user-1' }), 'user-1', 'admin');

      expect(decision.allowed).toBe(true);
    });

    it('allows a role holder who does not own the resource', () => {
      const credential = verified({ sub: 'admin-1', realm_access: { roles: ['admin'] } });

      expect(gate.requireOwnerOrRole(credential, 'user-1', 'admin').allowed).toBe(true);
    });

    it('forbids anyone else', () => {
      expect(gate.requireOwnerOrRole(verified({ sub: 'user-2' }), 'user-1', 'admin')).toEqual({
        allowed: false,
        reason: 'Forbidden',
        status: 403,
        message: "Only the owner or role 'admin' may access this resource",
      });
    });

    it('never matches an unknown owner', () => {
      expect(gate.requireOwnerOrRole(verified(), undefined, 'admin')).toMatchObject({
        reason: 'Forbidden',
      });
    });

    it('denies an unauthenticated caller with 401', () => {
      const decision = gate.requireOwnerOrRole(
        rejected(new AuthError('UnknownSigningKey')),
        'user-1',
        'admin',
      );

      expect(decision).toMatchObject({ reason: 'UnknownSigningKey', status: 401 });
    });
  });

  describe('evaluate', () => {
    it('allows public routes without a credential', () => {
      expect(gate.evaluate({ type: 'public' }, undefined)).toEqual({
        allowed: true,
        claims: undefined,
      });
    });

    it('allows public routes with a rejected credential but drops it', () => {
      const decision = gate.evaluate({ type: 'public' }, rejected(new AuthError('ExpiredToken')));

      expect(decision).toEqual({ allowed: true, claims: undefined });
    });

    it('carries the claims of a valid credential on public routes', () => {
      const decision = gate.evaluate({ type: 'public' }, verified({ sub: 'user-3' }));

      expect(decision).toMatchObject({ allowed: true, claims: { sub: 'user-3' } });
    });

    it('dispatches role policies', () => {
      expect(gate.evaluate({ type: 'role', role: 'admin' }, verified())).toMatchObject({
        reason: 'InsufficientRole',
      });
    });

    it('uses the resource owner from the context', () => {
      const policy = { type: 'owner-or-role', role: 'admin' } as const;

      expect(
        gate.evaluate(policy, verified({ sub: 'user-1' }), { resourceOwnerId: 'user-1' }).allowed,
      ).toBe(true);
      expect(gate.evaluate(policy, verified({ sub: 'user-1' })).allowed).toBe(false);
    });
  });
});

describe('collectRoles', () => {
  it('splits realm roles from the roles of one client', () => {
    const claims = createClaims({
      realm_access: { roles: ['user', 'offline_access'] },
      resource_access: {
        [CLIENT_ID]: { roles: ['editor'] },
        account: { roles: ['manage-account'] },
      },
    });

    expect(collectRoles(claims, CLIENT_ID)).toEqual({
      realmRoles: ['user', 'offline_access'],
      clientRoles: ['editor'],
    });
  });
});
