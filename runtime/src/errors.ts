/**
 * errors.ts: Error types raised by the conversation core.
 */

/**
 * Raised when configuration makes an operation meaningless (for example a
 * non-positive history limit). Not retried.
 */
export class ConfigurationError extends Error {
  readonly key?: string;

  constructor(message: string, key?: string) {
    super(message);
    this.name = "ConfigurationError";
    this.key = key;
  }
}

export class TraitValidationError extends Error {
  readonly field: string;
  readonly reason: string;

  constructor(field: string, reason: string) {
    super(`Invalid trait ${field}: ${reason}`);
    this.name = "TraitValidationError";
    this.field = field;
    this.reason = reason;
  }
}

export type FileExpansionErrorKind =
  | "not-found"
  | "permission-denied"
  | "too-large";

export class FileExpansionError extends Error {
  readonly kind: FileExpansionErrorKind;
  readonly path: string;

  constructor(kind: FileExpansionErrorKind, path: string, message?: string) {
    super(message ?? describeFileError(kind));
    this.name = "FileExpansionError";
    this.kind = kind;
    this.path = path;
  }
}

function describeFileError(kind: FileExpansionErrorKind): string {
  switch (kind) {
    case "not-found":
      return "file not found";
    case "permission-denied":
      return "permission denied";
    case "too-large":
      return "file too large";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
