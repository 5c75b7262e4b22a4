export { ClaimSetSchema, type ClaimSet } from './claimSet.schema.js';
export { EnvironmentSchema, type Environment } from './environment.schema.js';
export {
  JWKSchema,
  JWKSResponseSchema,
  type JWKSKey,
  type JWKSResponse,
} from './jwks.schema.js';
export { PolicySchema, type Policy } from './policy.schema.js';
export {
  OAuthErrorResponseSchema,
  ServiceTokenResponseSchema,
  type ServiceTokenResponse,
} from './serviceToken.schema.js';
