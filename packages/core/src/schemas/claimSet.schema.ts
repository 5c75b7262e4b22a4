import * as z from 'zod';

const RoleListSchema = z.object({
  roles: z.array(z.string()).default([]),
});

/**
 * Claims of a verified access token. Standard registered claims plus the
 * realm-level and per-client role structures issued by Keycloak.
 * Unknown claims are preserved.
 */
export const ClaimSetSchema = z.looseObject({
  sub: z.string().min(1),
  iss: z.string(),
  exp: z.number(),
  aud: z.union([z.string(), z.array(z.string())]).optional(),
  nbf: z.number().optional(),
  iat: z.number().optional(),
  jti: z.string().optional(),
  azp: z.string().optional(),
  scope: z.string().optional(),
  preferred_username: z.string().optional(),
  email: z.string().optional(),
  email_verified: z.boolean().optional(),
  name: z.string().optional(),
  given_name: z.string().optional(),
  family_name: z.string().optional(),
  realm_access: RoleListSchema.optional(),
  resource_access: z.record(z.string(), RoleListSchema).optional(),
});

export type ClaimSet = z.infer<typeof ClaimSetSchema>;
