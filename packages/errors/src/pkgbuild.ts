import { ExternalError } from "./bases/external-error.js";
import { InternalError } from "./bases/internal-error.js";

/**
 * Thrown when the bundled PKGBUILD template cannot be read.
 */
export class TemplateNotFoundError extends InternalError<"PKGBUILD_TEMPLATE_NOT_FOUND"> {
  constructor(
    public readonly templatePath: string,
    cause?: unknown,
  ) {
    super({
      code: "PKGBUILD_TEMPLATE_NOT_FOUND",
      message: `PKGBUILD template not found: ${templatePath}`,
      metadata: { templatePath },
      cause,
    });
  }
}

/**
 * Thrown when the rendered PKGBUILD cannot be written to disk.
 */
export class PkgbuildWriteError extends ExternalError<"PKGBUILD_WRITE_FAILED"> {
  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super({
      code: "PKGBUILD_WRITE_FAILED",
      message: `Could not write ${filePath}: ${reason}`,
      metadata: { filePath },
      cause,
    });
  }
}
