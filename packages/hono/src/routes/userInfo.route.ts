import { createUserProfile } from '@keygate/core';
import { type Handler } from 'hono';

import type { BearerAuth, BearerAuthEnv } from '../bearerAuth/index.js';

/**
 * Creates a route handler returning the caller's profile.
 * Mount it behind `requirePolicy('authenticated')` or a stricter policy.
 * @param auth - The bearer auth whose gate selects client roles
 * @returns Route handler for a user-info endpoint
 */
export function userInfoRouteHandler(auth: BearerAuth): Handler<BearerAuthEnv> {
  return (c) => {
    const claims = c.get('claims');
    if (!claims) {
      return c.json({ error: 'NoCredential', message: 'No bearer token provided' }, 401);
    }
    return c.json({ user: createUserProfile(claims, auth.gate.clientId) });
  };
}
