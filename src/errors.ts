export type ProviderErrorKind = "timeout" | "rate_limit" | "auth" | "http" | "transport";

/** Bad transcript handed to extraction. Never retried. */
export class InvalidInputError extends Error {
  override name = "InvalidInputError";
}

export class NotFoundError extends Error {
  override name = "NotFoundError";
}

/**
 * Failure talking to an upstream provider (transcripts or language model).
 * Transient kinds are safe for the caller to retry with backoff.
 */
export class ProviderError extends Error {
  override name = "ProviderError";

  constructor(
    message: string,
    readonly kind: ProviderErrorKind,
    readonly status?: number,
    options?: ErrorOptions
  ) {
    super(message, options);
  }

  get retryable(): boolean {
    return this.kind === "timeout" || this.kind === "rate_limit" || this.kind === "transport" ||
      (this.kind === "http" && (this.status ?? 0) >= 500);
  }
}

export class SinkError extends Error {
  override name = "SinkError";

  constructor(readonly sinkName: string, message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export class RunCancelledError extends Error {
  override name = "RunCancelledError";

  constructor(message = "Run cancelled", options?: ErrorOptions) {
    super(message, options);
  }
}

export class ConfigError extends Error {
  override name = "ConfigError";
}

/** Raised by a deadline; callers map it to ProviderError or a failed outcome. */
export class TimeoutError extends Error {
  override name = "TimeoutError";

  constructor(readonly timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

export function providerErrorFromStatus(
  source: string,
  status: number,
  detail?: string,
  options?: ErrorOptions
): ProviderError {
  const suffix = detail ? `: ${detail}` : "";
  if (status === 401 || status === 403) {
    return new ProviderError(`${source} rejected credentials (${status})${suffix}`, "auth", status, options);
  }
  if (status === 429) {
    return new ProviderError(`${source} rate limited the request${suffix}`, "rate_limit", status, options);
  }
  return new ProviderError(`${source} returned status ${status}${suffix}`, "http", status, options);
}
