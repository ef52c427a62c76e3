import { ExternalError } from "./bases/external-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

/**
 * Thrown when no Cargo.toml exists at the located path.
 */
export class ManifestFileNotFoundError extends NotFoundError<"MANIFEST_FILE_NOT_FOUND"> {
  constructor(public readonly filePath: string) {
    super({
      code: "MANIFEST_FILE_NOT_FOUND",
      message: `Manifest file not found: ${filePath}`,
      metadata: { filePath },
    });
  }
}

/**
 * Thrown when the manifest exists but reading it fails (permissions, EISDIR, ...).
 */
export class ManifestReadError extends ExternalError<"MANIFEST_READ_FAILED"> {
  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super({
      code: "MANIFEST_READ_FAILED",
      message: `Could not read manifest ${filePath}: ${reason}`,
      metadata: { filePath },
      cause,
    });
  }
}

/**
 * Thrown when the manifest text is not valid TOML.
 */
export class ManifestParseError extends ValidationError<"MANIFEST_PARSE_FAILED"> {
  constructor(
    public readonly filePath: string | undefined,
    reason: string,
    public readonly line?: number | undefined,
    public readonly column?: number | undefined,
    cause?: unknown,
  ) {
    const location =
      line !== undefined ? ` at line ${line}${column !== undefined ? `:${column}` : ""}` : "";
    super({
      code: "MANIFEST_PARSE_FAILED",
      message: `Could not decode manifest${filePath ? ` (${filePath})` : ""}${location}: ${reason}`,
      ...(filePath ? { metadata: { filePath } } : {}),
      cause,
    });
  }
}

/**
 * Thrown when the decoded manifest lacks required fields or has fields of
 * the wrong type. Carries one issue per offending field.
 */
export class ManifestSchemaError extends ValidationError<"MANIFEST_VALIDATION_FAILED"> {
  constructor(issues: readonly ValidationIssue[], cause?: unknown) {
    super({
      code: "MANIFEST_VALIDATION_FAILED",
      message: `Manifest validation failed:\n${issues.map((i) => `  - ${i.field}: ${i.message}`).join("\n")}`,
      issues,
      cause,
    });
  }
}
