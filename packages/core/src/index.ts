export { TokenVerifier, type ExpectedClaims } from './tokenVerifier.js';
export {
  AUTH_ERROR_KINDS,
  AUTH_ERROR_STATUS,
  AuthError,
  type AuthErrorKind,
  formatError,
  isAuthError,
} from './errors/authError.js';
export * from './interfaces/index.js';
export * from './schemas/index.js';
export {
  AuthorizationGate,
  collectRoles,
  type PolicyContext,
} from './services/authorizationGate.service.js';
export {
  ServiceTokenError,
  ServiceTokenService,
} from './services/serviceToken.service.js';
export {
  SigningKeyCache,
  type SigningKeyCacheOptions,
} from './services/signingKeyCache.service.js';
export { createUserProfile } from './services/userProfile.service.js';
export { resolveKeyAlgorithm } from './utils/algorithms.js';
export {
  type BearerExtraction,
  extractBearerToken,
  hasCompactJwsShape,
} from './utils/bearerToken.js';
export { loadConfigFromEnv } from './utils/config.js';
export { certsUrl, realmIssuer, tokenUrl } from './utils/keycloakUrls.js';
export { parsePolicy } from './utils/policyParsing.js';
