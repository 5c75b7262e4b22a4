export type {
  AuthDecision,
  AuthDenial,
  Credential,
  PolicyDecision,
  VerificationResult,
} from './authDecision.js';
export type { ClientAuthentication, ServiceTokenConfig } from './serviceTokenConfig.js';
export type { SigningKey, SigningKeySet } from './signingKey.js';
export type { UserProfile } from './userProfile.js';
export type { KeyCacheOptions, VerifierConfig } from './verifierConfig.js';
