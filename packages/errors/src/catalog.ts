/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised by pkgforge is listed here. Each code maps to a
 * domain, a base error type and the process exit code the CLI terminates
 * with (BSD sysexits values).
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: INTERNAL, VALIDATION, RESOURCE, IO, CLI, MANIFEST, PKGBUILD
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "NotFoundError" | "ExternalError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - Bugs and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    exitCode: 70,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // GENERIC ERRORS
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    exitCode: 65,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Validation failed",
    description: "The input data is invalid",
  },
  RESOURCE_NOT_FOUND: {
    domain: "resource",
    exitCode: 66,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Resource not found",
    description: "The requested resource does not exist",
  },
  IO_FAILED: {
    domain: "io",
    exitCode: 74,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "I/O failure",
    description: "A filesystem operation failed",
  },

  // ============================================================================
  // CLI ERRORS
  // ============================================================================
  CLI_USAGE_INVALID: {
    domain: "cli",
    exitCode: 64,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid usage",
    description: "The command line arguments are invalid",
  },

  // ============================================================================
  // MANIFEST ERRORS — Cargo.toml loader
  // ============================================================================
  MANIFEST_FILE_NOT_FOUND: {
    domain: "manifest",
    exitCode: 66,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Manifest file not found",
    description: "The Cargo.toml manifest does not exist",
  },
  MANIFEST_READ_FAILED: {
    domain: "manifest",
    exitCode: 74,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Manifest read failed",
    description: "The Cargo.toml manifest exists but could not be read",
  },
  MANIFEST_PARSE_FAILED: {
    domain: "manifest",
    exitCode: 65,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Manifest decode failed",
    description: "The manifest file contains invalid TOML syntax",
  },
  MANIFEST_VALIDATION_FAILED: {
    domain: "manifest",
    exitCode: 65,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Manifest validation failed",
    description: "The manifest is missing required fields or has fields of the wrong type",
  },

  // ============================================================================
  // PKGBUILD ERRORS — recipe rendering and output
  // ============================================================================
  PKGBUILD_TEMPLATE_NOT_FOUND: {
    domain: "pkgbuild",
    exitCode: 70,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "PKGBUILD template missing",
    description: "The bundled PKGBUILD template could not be read",
  },
  PKGBUILD_WRITE_FAILED: {
    domain: "pkgbuild",
    exitCode: 73,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "PKGBUILD write failed",
    description: "The PKGBUILD file could not be created or written",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Process exit codes used in the catalog
 */
export type ExitCode = ErrorCatalogEntry["exitCode"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];

/**
 * Look up error catalog entry by code
 */
export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}
