/**
 * Authentication and Authorization Module
 *
 * Session tokens and API keys resolve to one Principal; capabilities come
 * from the user's role, capped by API key scopes.
 */

// Token services
export { signJWT, verifyJWT, MAX_TOKEN_SIZE, type JWTPayload, type TokenValidationResult } from "./jwt";
export { SessionTokenService, type IssuedSessionToken } from "./session-token";
export {
  ApiKeyService,
  createApiKeySchema,
  generateApiKeySecret,
  isKeyExpired,
  normalizeScopes,
  summarizeKeyUsage,
  toKeyInfo,
  type ApiKeyInfo,
  type ApiKeyUsageStats,
  type CreateApiKeyInput,
} from "./api-keys";
export { createPasswordHasher, type PasswordHasher } from "./passwords";
export { TokenDenylist } from "./denylist";
export { createAuthServices, type AuthServices, type AuthServicesOptions } from "./token-service";

// Identity
export { IdentityResolver, classifyCredential, type CredentialKind } from "./identity";
export type { Principal, SessionPrincipal, ApiKeyPrincipal, AuthFailure, AuthResult } from "./principal";

// Middleware
export {
  requireAuth,
  optionalAuth,
  getPrincipal,
  extractCredential,
  ACCESS_TOKEN_COOKIE,
  type ExtractedCredential,
} from "./middleware";
export { csrfGuard, csrfTokenFor, CSRF_COOKIE, CSRF_HEADER, CSRF_FIELD } from "./csrf";

// Authorization
export { Authorizer } from "./authorizer";
export {
  ACTIONS,
  RESOURCE_TYPES,
  intersectCapabilities,
  effectiveCapabilities,
  roleCapabilities,
  scopeCapabilities,
  type Action,
  type ResourceRef,
  type ResourceType,
  type CapabilitySet,
} from "./permissions";

// Errors
export {
  UnauthenticatedError,
  ForbiddenError,
  RateLimitedError,
  CsrfRejectedError,
  InvalidScopesError,
} from "./errors";
