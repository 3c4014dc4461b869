import { Violation } from "./types";

/**
 * Custom error classes for the integrity monitor and sidecar store
 */

export class IntegrityError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "IntegrityError";
  }
}

export class IOFailureError extends IntegrityError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message, "IO_FAILURE");
    this.name = "IOFailureError";
  }
}

export class VerificationFailedError extends IntegrityError {
  constructor(public readonly violations: Violation[]) {
    super(
      `${violations.length} file(s) failed integrity verification: ${violations
        .map((v) => v.relativePath)
        .join(", ")}`,
      "VERIFICATION_FAILED",
    );
    this.name = "VerificationFailedError";
  }
}

export class ConfigError extends IntegrityError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

/**
 * Message of anything thrown. Errors raised by Node internals may come from
 * another realm (e.g. under Jest), so the shape is checked, not the class.
 */
export function errorMessage(error: unknown): string {
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}

/**
 * System error code (ENOENT, EISDIR, ...) of a thrown value, if any
 */
export function errorCode(error: unknown): string | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}

/**
 * Wraps a low-level fs error so the message always names the offending path.
 */
export function ioFailure(
  action: string,
  filePath: string,
  error: unknown,
): IOFailureError {
  return new IOFailureError(
    `Failed to ${action} ${filePath}: ${errorMessage(error)}`,
    filePath,
  );
}

// Error codes for easy reference
export const ErrorCodes = {
  IO_FAILURE: "IO_FAILURE",
  VERIFICATION_FAILED: "VERIFICATION_FAILED",
  CONFIG_ERROR: "CONFIG_ERROR",
} as const;
