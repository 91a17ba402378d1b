/**
 * Auth error taxonomy
 *
 * Every class carries the wire code and status it maps to; the API error
 * handler translates them in one place. None of the messages say which check failed.
 */

/**
 * No credential, or a credential that did not resolve to an active user
 */
export class UnauthenticatedError extends Error {
  code = "UNAUTHENTICATED" as const;
  statusCode = 401 as const;

  constructor() {
    super("Invalid credentials");
    this.name = "UnauthenticatedError";
  }
}

/**
 * Authenticated, but the principal lacks the capability.
 * Names the resource, never the rule.
 */
export class ForbiddenError extends Error {
  code = "FORBIDDEN" as const;
  statusCode = 403 as const;
  action: string;
  resourceType: string;
  resourceId: string | null;

  constructor(action: string, resourceType: string, resourceId: string | null = null) {
    super(
      resourceId
        ? `Access denied to ${resourceType} ${resourceId}`
        : `Access denied to ${resourceType}`
    );
    this.name = "ForbiddenError";
    this.action = action;
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

export class RateLimitedError extends Error {
  code = "RATE_LIMITED" as const;
  statusCode = 429 as const;

  constructor(public retryAfterSeconds: number) {
    super("Too many requests. Please try again later.");
    this.name = "RateLimitedError";
  }
}

export class CsrfRejectedError extends Error {
  code = "CSRF_REJECTED" as const;
  statusCode = 403 as const;

  constructor(public reason: "missing" | "mismatch") {
    super(reason === "missing" ? "CSRF token missing" : "CSRF token invalid");
    this.name = "CsrfRejectedError";
  }
}

/**
 * Requested API key scopes exceed what the owning user may hold
 */
export class InvalidScopesError extends Error {
  code = "INVALID_SCOPES" as const;
  statusCode = 400 as const;

  constructor(public scopes: string[]) {
    super(`Scopes not permitted for this account: ${scopes.join(", ")}`);
    this.name = "InvalidScopesError";
  }
}
