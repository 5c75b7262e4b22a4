import * as z from 'zod';

/** OAuth2 token endpoint response for the client credentials grant. */
export const ServiceTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default('Bearer'),
  expires_in: z.number().int().positive().optional(),
  scope: z.string().optional(),
});

export type ServiceTokenResponse = z.infer<typeof ServiceTokenResponseSchema>;

/** OAuth2 error response (RFC 6749 section 5.2). */
export const OAuthErrorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});
