import { type Policy, PolicySchema } from '../schemas/index.js';

/**
 * Parses a route policy declaration.
 *
 * Accepted forms: `public`, `authenticated`, `role:<name>`, `owner-or-role:<name>`.
 *
 * @throws {Error} When the declaration is not one of the accepted forms
 *
 * @example
 * ```typescript
 * parsePolicy('owner-or-role:admin'); // { type: 'owner-or-role', role: 'admin' }
 * ```
 */
export function parsePolicy(declaration: string): Policy {
  const trimmed = declaration.trim();
  const separator = trimmed.indexOf(':');
  const candidate =
    separator === -1
      ? { type: trimmed }
      : { type: trimmed.slice(0, separator), role: trimmed.slice(separator + 1).trim() };

  const result = PolicySchema.safeParse(candidate);
  if (!result.success) {
    throw new Error(`[Policy] Invalid policy declaration '${declaration}'`);
  }
  return result.data;
}
