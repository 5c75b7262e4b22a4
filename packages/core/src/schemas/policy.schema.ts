import * as z from 'zod';

const RoleNameSchema = z.string().min(1, 'role name is required');

/**
 * Endpoint access policy. Parsed from route declarations such as
 * `authenticated`, `role:admin` or `owner-or-role:admin`.
 */
export const PolicySchema = z.discriminatedUnion('type', [
  z.strictObject({ type: z.literal('public') }),
  z.strictObject({ type: z.literal('authenticated') }),
  z.object({ type: z.literal('role'), role: RoleNameSchema }),
  z.object({ type: z.literal('owner-or-role'), role: RoleNameSchema }),
]);

export type Policy = z.infer<typeof PolicySchema>;
