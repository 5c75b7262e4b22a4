/**
 * Caller identity derived from a verified claim set, safe to return to clients.
 */
export interface UserProfile {
  /** Subject identifier (`sub`) */
  id: string;
  username: string;
  email?: string;
  emailVerified?: boolean;
  name?: string;
  givenName?: string;
  familyName?: string;

  /** Realm-wide roles (`realm_access.roles`) */
  realmRoles: string[];

  /** Roles scoped to this service's client (`resource_access[clientId].roles`) */
  clientRoles: string[];

  issuer: string;

  /** ISO-8601 timestamp of `iat`, when present */
  issuedAt?: string;

  /** ISO-8601 timestamp of `exp` */
  expiresAt: string;
}
