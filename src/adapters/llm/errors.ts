/**
 * Shared error types for LLM client failures
 */

/**
 * Base error for every provider failure
 */
export class LlmClientError extends Error {
  readonly name: string = "LlmClientError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LlmClientError);
    }
  }
}

/**
 * Upstream timeout error - thrown when an LLM API call times out
 */
export class UpstreamTimeoutError extends LlmClientError {
  readonly name: string = "UpstreamTimeoutError";

  constructor(
    message: string,
    provider: string,
    public readonly elapsedMs: number,
    cause?: unknown
  ) {
    super(message, provider, cause);
  }
}

/**
 * Upstream HTTP error - thrown when an LLM API returns a non-2xx status
 *
 * Captures the HTTP status code and request ID for cross-referencing with
 * provider logs.
 */
export class UpstreamHTTPError extends LlmClientError {
  readonly name: string = "UpstreamHTTPError";

  constructor(
    message: string,
    provider: string,
    public readonly status: number,
    public readonly requestId: string | undefined,
    public readonly elapsedMs: number,
    cause?: unknown
  ) {
    super(message, provider, cause);
  }
}
