import type { ErrorKind, ProviderFailure } from "./types.js";

/**
 * Raised when a required credential is missing. This is the one error that
 * crosses a boundary: it is fatal at client construction, before any
 * network call is attempted.
 */
export class ConfigurationError extends Error {
  readonly kind = "configuration" as const;

  constructor(
    message: string,
    /** Environment variable that would fix the problem */
    readonly variable?: string,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Malformed user input to a command (non-numeric id, missing argument). */
export class ArgumentError extends Error {
  readonly kind = "argument" as const;

  constructor(message: string) {
    super(message);
    this.name = "ArgumentError";
  }
}

export function failure(
  kind: ErrorKind,
  message: string,
  extra?: { statusCode?: number; details?: string },
): ProviderFailure {
  return { kind, message, ...extra };
}

/** Stringify an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
