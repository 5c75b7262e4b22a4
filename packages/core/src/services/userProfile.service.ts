import type { UserProfile } from '../interfaces/userProfile.js';
import type { ClaimSet } from '../schemas/index.js';

import { collectRoles } from './authorizationGate.service.js';

function toIsoTimestamp(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString();
}

/**
 * Projects a verified claim set onto the caller profile returned by user-info endpoints.
 *
 * @param claims - Verified claims of the caller
 * @param clientId - This service's client id, selecting which client roles to include
 */
export function createUserProfile(claims: ClaimSet, clientId: string): UserProfile {
  const { realmRoles, clientRoles } = collectRoles(claims, clientId);

  return {
    id: claims.sub,
    username: claims.preferred_username ?? 'unknown',
    email: claims.email,
    emailVerified: claims.email_verified,
    name: claims.name,
    givenName: claims.given_name,
    familyName: claims.family_name,
    realmRoles,
    clientRoles,
    issuer: claims.iss,
    issuedAt: claims.iat !== undefined ? toIsoTimestamp(claims.iat) : undefined,
    expiresAt: toIsoTimestamp(claims.exp),
  };
}
