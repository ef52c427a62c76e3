import { PkgforgeError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import { ERROR_CATALOG, type ErrorCode, type ExitCode, getCatalogEntry } from "./catalog.js";

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return code in ERROR_CATALOG;
}

/**
 * Get all error codes in the catalog
 */
export function getAllErrorCodes(): ErrorCode[] {
  return Object.keys(ERROR_CATALOG).filter(isValidErrorCode);
}

/**
 * Get all error codes for a specific domain
 */
export function getErrorCodesByDomain(domain: string): ErrorCode[] {
  return getAllErrorCodes().filter((code) => ERROR_CATALOG[code].domain === domain);
}

/**
 * Wrap an unknown error into a PkgforgeError.
 * If the error is already a PkgforgeError, return it as-is.
 * Otherwise, wrap it in an InternalError that keeps the original as `cause`.
 */
export function wrapError(error: unknown): PkgforgeError {
  if (error instanceof PkgforgeError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError({
      code: "INTERNAL_ERROR",
      message: error.message,
      metadata: { originalName: error.name },
      cause: error,
    });
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError(message);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Process exit code for any thrown value. Non-pkgforge errors exit as
 * internal errors.
 */
export function getExitCode(error: unknown): ExitCode {
  return error instanceof PkgforgeError ? error.exitCode : getCatalogEntry("INTERNAL_ERROR").exitCode;
}

/**
 * Validate catalog consistency (for tests)
 * Checks:
 * - All codes are UPPER_SNAKE_CASE
 * - All codes start with their domain prefix (except generic codes)
 * - All exit codes are in the sysexits range (64-78)
 */
export function validateCatalog(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const genericCodes = new Set<string>(["INTERNAL_ERROR", "VALIDATION_FAILED", "RESOURCE_NOT_FOUND", "IO_FAILED"]);

  for (const code of getAllErrorCodes()) {
    const entry = ERROR_CATALOG[code];

    if (!/^[A-Z][A-Z0-9_]*$/.test(code)) {
      errors.push(`Code '${code}' is not in UPPER_SNAKE_CASE format`);
    }

    if (!genericCodes.has(code) && !code.startsWith(`${entry.domain.toUpperCase()}_`)) {
      errors.push(`Code '${code}' does not start with its domain '${entry.domain}'`);
    }

    if (entry.exitCode < 64 || entry.exitCode > 78) {
      errors.push(`Code '${code}' has exit code ${entry.exitCode} outside the sysexits range`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
