/**
 * @pkgforge/errors
 *
 * Shared error taxonomy for pkgforge.
 *
 * The error system is built on 4 behavioral base types:
 * ValidationError, NotFoundError, ExternalError, InternalError
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific condition and an `.exitCode` the CLI terminates with. Use
 * `error.code === "XXX"` for fine-grained matching, or
 * `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isPkgforgeError, PkgforgeError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type ExitCode,
  getCatalogEntry,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getErrorCodesByDomain,
  getErrorMessage,
  getExitCode,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { ExternalError, InternalError, NotFoundError, ValidationError } from "./bases/index.js";

export type {
  ExternalCodes,
  InternalCodes,
  NotFoundCodes,
  PkgforgeErrorOptions,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isExpectedError,
  isExternalError,
  isInternalError,
  isNotFoundError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export { UsageError } from "./cli.js";
export {
  ManifestFileNotFoundError,
  ManifestParseError,
  ManifestReadError,
  ManifestSchemaError,
} from "./manifest.js";
export { PkgbuildWriteError, TemplateNotFoundError } from "./pkgbuild.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@pkgforge/errors";
