import type { ProviderName } from "./types.js";

export type BackendErrorKind = "unavailable" | "auth" | "rate-limited" | "timeout";

export class BackendError extends Error {
  readonly kind: BackendErrorKind;
  readonly provider: ProviderName;
  readonly recoverable: boolean;
  readonly statusCode?: number;

  constructor(
    message: string,
    options: {
      kind: BackendErrorKind;
      provider: ProviderName;
      statusCode?: number;
    },
  ) {
    super(message);
    this.name = "BackendError";
    this.kind = options.kind;
    this.provider = options.provider;
    this.statusCode = options.statusCode;
    this.recoverable = options.kind !== "auth";
  }
}

export function classifyStatus(status: number): BackendErrorKind {
  if (status === 401 || status === 403) return "auth";
  if (status === 429) return "rate-limited";
  if (status === 408 || status === 504) return "timeout";
  return "unavailable";
}

/**
 * Normalise anything thrown by fetch or a provider SDK into a BackendError.
 */
export function toBackendError(
  error: unknown,
  provider: ProviderName,
): BackendError {
  if (error instanceof BackendError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";
  const status =
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
      ? error.status
      : undefined;

  if (status !== undefined) {
    return new BackendError(`${provider} API error ${status}: ${message}`, {
      kind: classifyStatus(status),
      provider,
      statusCode: status,
    });
  }

  const lower = message.toLowerCase();
  if (
    name === "TimeoutError" ||
    name === "APIConnectionTimeoutError" ||
    lower.includes("timeout") ||
    lower.includes("timed out")
  ) {
    return new BackendError(`${provider} request timed out: ${message}`, {
      kind: "timeout",
      provider,
    });
  }

  return new BackendError(`${provider} is unavailable: ${message}`, {
    kind: "unavailable",
    provider,
  });
}
