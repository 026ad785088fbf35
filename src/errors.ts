import OpenAI from "openai";

export class DimensionMismatchError extends Error {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, where?: string) {
    super(
      `Embedding dimension mismatch${where ? ` at ${where}` : ""}: expected=${expected} actual=${actual}`
    );
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class DegenerateVectorError extends Error {
  constructor(message = "Vector has zero norm and cannot be normalized") {
    super(message);
    this.name = "DegenerateVectorError";
  }
}

export class InvalidRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRecordError";
  }
}

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class PollTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PollTimeoutError";
  }
}

export class FileProcessingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FileProcessingError";
  }
}

/**
 * Errors raised by the hosted API after classification. `cause` keeps the
 * original SDK error.
 */
export class ServiceUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ServiceUnavailableError";
  }
}

export class RateLimitedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RateLimitedError";
  }
}

export class AuthenticationFailedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthenticationFailedError";
  }
}

const CONNECTION_ERROR_NAMES = new Set([
  "APIConnectionError",
  "APIConnectionTimeoutError",
  "TimeoutError"
]);

// LangChain's OpenAI wrappers may carry their own copy of the SDK, so
// connection failures are matched by name as well as by class.
function isConnectionError(err: unknown): boolean {
  if (err instanceof OpenAI.APIConnectionError) {
    return true;
  }
  return err instanceof Error && CONNECTION_ERROR_NAMES.has(err.name);
}

function statusOf(err: unknown): number | undefined {
  if (err instanceof OpenAI.APIError) {
    return err.status;
  }
  if (err && typeof err === "object" && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

/**
 * Maps an error thrown by the OpenAI SDK (directly or through a LangChain
 * wrapper) onto the service error taxonomy. Anything unrecognized is returned
 * unchanged.
 */
export function classifyServiceError(err: unknown): unknown {
  if (
    err instanceof RateLimitedError ||
    err instanceof AuthenticationFailedError ||
    err instanceof ServiceUnavailableError
  ) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);

  if (isConnectionError(err)) {
    return new ServiceUnavailableError(`Could not reach the API: ${message}`, { cause: err });
  }

  const status = statusOf(err);
  if (status === 429) {
    return new RateLimitedError(`Rate limit or quota exceeded: ${message}`, { cause: err });
  }
  if (status === 401 || status === 403) {
    return new AuthenticationFailedError(`Authentication failed: ${message}`, { cause: err });
  }
  if (status !== undefined && status >= 500) {
    return new ServiceUnavailableError(`API error (${status}): ${message}`, { cause: err });
  }
  return err;
}

/** Awaits an API call and rethrows its failure in classified form. */
export async function callService<T>(call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err: unknown) {
    throw classifyServiceError(err);
  }
}

export function hintFor(err: unknown): string | undefined {
  if (err instanceof RateLimitedError) {
    return "Check the account's billing and usage limits, then try again later.";
  }
  if (err instanceof AuthenticationFailedError) {
    return "The API key may be invalid or expired. Check OPENAI_API_KEY.";
  }
  return undefined;
}
