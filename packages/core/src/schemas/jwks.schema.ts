import * as z from 'zod';

/**
 * A single public JSON Web Key as published by the identity provider (RFC 7517).
 * Private members and certificate chains are dropped.
 */
export const JWKSchema = z.object({
  kty: z.string(),
  kid: z.string().optional(),
  use: z.string().optional(),
  alg: z.string().optional(),
  // RSA
  n: z.string().optional(),
  e: z.string().optional(),
  // EC / OKP
  crv: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
});

export const JWKSResponseSchema = z.object({
  keys: z.array(JWKSchema),
});

export type JWKSKey = z.infer<typeof JWKSchema>;
export type JWKSResponse = z.infer<typeof JWKSResponseSchema>;
