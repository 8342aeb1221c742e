/**
 * Error taxonomy shared by providers and the dispatcher.
 *
 * Each kind carries a stable `code` so callers can branch without
 * `instanceof` chains across package boundaries.
 */

export type AIProviderErrorCode =
  | "UNKNOWN_PROVIDER"
  | "INVALID_MODEL"
  | "TRANSIENT_BACKEND"
  | "CREDENTIALS_EXHAUSTED"
  | "UNSUPPORTED_INPUT_SHAPE"
  | "MALFORMED_RESPONSE"
  | "CACHE_IO"
  | "PROVIDER_REQUEST"
  | "NO_PROVIDER_AVAILABLE"
  | "REQUEST_CANCELLED"
  | "CONFIG";

export class AIProviderError extends Error {
  readonly code: AIProviderErrorCode;
  /** Provider the error originated from, when known */
  readonly providerId?: string;

  constructor(code: AIProviderErrorCode, message: string, providerId?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AIProviderError";
    this.code = code;
    this.providerId = providerId;
  }
}

/** Requested provider id was never registered. */
export class UnknownProviderError extends AIProviderError {
  constructor(providerId: string) {
    super("UNKNOWN_PROVIDER", `Unknown provider: ${providerId}`, providerId);
    this.name = "UnknownProviderError";
  }
}

/** Model not served by any registered provider, or rejected by its owner. */
export class InvalidModelError extends AIProviderError {
  readonly model: string;

  constructor(model: string, providerId?: string) {
    super(
      "INVALID_MODEL",
      providerId ? `Model "${model}" is not supported by ${providerId}` : `No provider serves model "${model}"`,
      providerId
    );
    this.name = "InvalidModelError";
    this.model = model;
  }
}

export type TransientReason = "rate-limited" | "server-error" | "credential-rejected" | "network";

/** Retryable backend failure: 429, 5xx, rejected key or network fault. */
export class TransientBackendError extends AIProviderError {
  readonly reason: TransientReason;
  readonly status?: number;

  constructor(providerId: string, reason: TransientReason, message: string, status?: number, options?: { cause?: unknown }) {
    super("TRANSIENT_BACKEND", message, providerId, options);
    this.name = "TransientBackendError";
    this.reason = reason;
    this.status = status;
  }
}

/** Every key in a provider's pool is exhausted or failed. */
export class CredentialsExhaustedError extends AIProviderError {
  constructor(providerId: string) {
    super("CREDENTIALS_EXHAUSTED", `All API keys for ${providerId} are exhausted`, providerId);
    this.name = "CredentialsExhaustedError";
  }
}

/** Provider cannot accept the request's input shape (e.g. file vs microphone). */
export class UnsupportedInputShapeError extends AIProviderError {
  constructor(providerId: string, message: string) {
    super("UNSUPPORTED_INPUT_SHAPE", message, providerId);
    this.name = "UnsupportedInputShapeError";
  }
}

/** Backend answered but the payload could not be understood. */
export class MalformedResponseError extends AIProviderError {
  constructor(providerId: string, message: string) {
    super("MALFORMED_RESPONSE", message, providerId);
    this.name = "MalformedResponseError";
  }
}

/** Disk cache read or write failed. Never fatal to a request. */
export class CacheIOError extends AIProviderError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("CACHE_IO", `${message}: ${path}`, undefined, options);
    this.name = "CacheIOError";
    this.path = path;
  }
}

/** Non-retryable rejection of one request (4xx other than auth/rate limit). */
export class ProviderRequestError extends AIProviderError {
  readonly status?: number;

  constructor(providerId: string, message: string, status?: number, options?: { cause?: unknown }) {
    super("PROVIDER_REQUEST", message, providerId, options);
    this.name = "ProviderRequestError";
    this.status = status;
  }
}

/** No configured provider supports the requested capability. */
export class NoProviderAvailableError extends AIProviderError {
  constructor(capability: string) {
    super("NO_PROVIDER_AVAILABLE", `No configured provider supports ${capability}`);
    this.name = "NoProviderAvailableError";
  }
}

export class RequestCancelledError extends AIProviderError {
  constructor() {
    super("REQUEST_CANCELLED", "Request was cancelled");
    this.name = "RequestCancelledError";
  }
}

/** Configuration file or environment is invalid. */
export class ConfigError extends AIProviderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG", message, undefined, options);
    this.name = "ConfigError";
  }
}

export function isAIProviderError(error: unknown): error is AIProviderError {
  return error instanceof AIProviderError;
}

const MAX_BODY_IN_MESSAGE = 300;

/**
 * Map a non-2xx HTTP status to the error kind the dispatcher acts on.
 *
 * 429 is a rate limit, 401/402/403 a rejected credential, 5xx a server
 * error; everything else rejects the request itself.
 */
export function classifyHttpFailure(providerId: string, status: number, body: string): AIProviderError {
  const detail = body.length > MAX_BODY_IN_MESSAGE ? `${body.slice(0, MAX_BODY_IN_MESSAGE)}...` : body;
  const message = `${providerId} API error (${status}): ${detail}`;

  if (status === 429) {
    return new TransientBackendError(providerId, "rate-limited", message, status);
  }
  if (status === 401 || status === 402 || status === 403) {
    return new TransientBackendError(providerId, "credential-rejected", message, status);
  }
  if (status >= 500) {
    return new TransientBackendError(providerId, "server-error", message, status);
  }
  return new ProviderRequestError(providerId, message, status);
}
