/**
 * Error taxonomy
 *
 * Every error raised by the engine extends ResearchEngineError and carries a
 * stable `code` so callers (and the HTTP layer) can branch without instanceof
 * chains across package boundaries.
 */

export type ErrorCode =
  | "network_error"
  | "rate_limited"
  | "access_denied"
  | "timeout"
  | "model_error"
  | "model_unavailable"
  | "model_overloaded"
  | "privacy_violation"
  | "research_error"
  | "source_exhausted"
  | "saturation_not_reached"
  | "configuration_error"
  | "storage_error"
  | "session_not_found";

export class ResearchEngineError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// =============================================================================
// Network
// =============================================================================

export interface NetworkErrorDetails {
  provider?: string;
  url?: string;
  status?: number;
  retryable?: boolean;
  cause?: unknown;
}

export class NetworkError extends ResearchEngineError {
  readonly provider?: string;
  readonly url?: string;
  readonly status?: number;
  readonly retryable: boolean;

  constructor(
    message: string,
    details: NetworkErrorDetails = {},
    code: ErrorCode = "network_error"
  ) {
    super(message, code, { cause: details.cause });
    this.provider = details.provider;
    this.url = details.url;
    this.status = details.status;
    this.retryable = details.retryable ?? false;
  }
}

export class RateLimitError extends NetworkError {
  /** Server-requested wait before the next attempt, when it sent one */
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    details: NetworkErrorDetails & { retryAfterMs?: number } = {}
  ) {
    super(message, { ...details, retryable: true }, "rate_limited");
    this.retryAfterMs = details.retryAfterMs;
  }
}

export class AccessDeniedError extends NetworkError {
  constructor(message: string, details: NetworkErrorDetails = {}) {
    super(message, { ...details, retryable: false }, "access_denied");
  }
}

export class TimeoutError extends NetworkError {
  constructor(message: string, details: NetworkErrorDetails = {}) {
    super(message, { ...details, retryable: true }, "timeout");
  }
}

// =============================================================================
// Model
// =============================================================================

export class ModelError extends ResearchEngineError {
  readonly model?: string;

  constructor(
    message: string,
    model?: string,
    code: ErrorCode = "model_error",
    options?: { cause?: unknown }
  ) {
    super(message, code, options);
    this.model = model;
  }
}

export class ModelUnavailableError extends ModelError {
  constructor(message: string, model?: string, options?: { cause?: unknown }) {
    super(message, model, "model_unavailable", options);
  }
}

export class ModelOverloadedError extends ModelError {
  constructor(message: string, model?: string, options?: { cause?: unknown }) {
    super(message, model, "model_overloaded", options);
  }
}

/** Raised when a cloud model would see LOCAL_ONLY data. Never retried. */
export class PrivacyViolationError extends ModelError {
  constructor(message: string, model?: string) {
    super(message, model, "privacy_violation");
  }
}

// =============================================================================
// Research flow
// =============================================================================

export class ResearchError extends ResearchEngineError {
  constructor(
    message: string,
    code: ErrorCode = "research_error",
    options?: { cause?: unknown }
  ) {
    super(message, code, options);
  }
}

export class SourceExhaustedError extends ResearchError {
  readonly providers: string[];

  constructor(providers: string[]) {
    super(
      `No results from any provider (${providers.join(", ") || "none configured"})`,
      "source_exhausted"
    );
    this.providers = providers;
  }
}

export class SaturationNotReachedError extends ResearchError {
  constructor(message: string) {
    super(message, "saturation_not_reached");
  }
}

export class ConfigurationError extends ResearchEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "configuration_error", options);
  }
}

export class StorageError extends ResearchEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "storage_error", options);
  }
}

export class SessionNotFoundError extends ResearchEngineError {
  constructor(sessionId: string) {
    super(`Research session not found: ${sessionId}`, "session_not_found");
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isRetryable(error: unknown): boolean {
  if (error instanceof NetworkError) return error.retryable;
  return error instanceof ModelOverloadedError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(
  value: string | null,
  now: number = Date.now()
): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * Map a non-OK HTTP response onto the network error taxonomy
 */
export function errorFromResponse(
  status: number,
  headers: { get(name: string): string | null },
  provider: string,
  url: string
): NetworkError {
  const details = { provider, url, status };
  if (status === 429) {
    return new RateLimitError(`${provider} rate limited (429)`, {
      ...details,
      retryAfterMs: parseRetryAfter(headers.get("retry-after")),
    });
  }
  if (status === 401 || status === 403 || status === 404) {
    return new AccessDeniedError(`${provider} denied access (${status})`, details);
  }
  if (status === 408 || status === 504) {
    return new TimeoutError(`${provider} timed out (${status})`, details);
  }
  return new NetworkError(`${provider} request failed (${status})`, {
    ...details,
    retryable: status >= 500,
  });
}
