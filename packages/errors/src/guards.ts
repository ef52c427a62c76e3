/**
 * Type guards for the base error types + code-level discrimination.
 */

import { PkgforgeError } from "./base.js";
import { ExternalError } from "./bases/external-error.js";
import { InternalError } from "./bases/internal-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ErrorCode } from "./catalog.js";

/** Check if an error is a ValidationError (bad input, manifest) */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/** Check if an error is a NotFoundError (file missing) */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/** Check if an error is an ExternalError (filesystem failure) */
export function isExternalError(error: unknown): error is ExternalError {
  return error instanceof ExternalError;
}

/** Check if an error is an InternalError (bug, broken install) */
export function isInternalError(error: unknown): error is InternalError {
  return error instanceof InternalError;
}

/**
 * Check if a PkgforgeError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: PkgforgeError,
  code: C,
): error is PkgforgeError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (bad input rather than a bug).
 * Returns false for non-pkgforge values.
 */
export function isExpectedError(error: unknown): boolean {
  return error instanceof PkgforgeError && error.isExpected;
}
