import { PkgforgeError } from "../base.js";
import { type CodesForBase, type ErrorDomain, type ExitCode, getCatalogEntry } from "../catalog.js";
import type { PkgforgeErrorOptions, ValidationIssue } from "../types.js";

type ValidationCode = CodesForBase<"ValidationError">;

/**
 * Errors caused by invalid input: bad arguments, undecodable or incomplete
 * manifests. Exit 64/65. The `.code` field discriminates the specific error.
 */
export class ValidationError<C extends ValidationCode = "VALIDATION_FAILED"> extends PkgforgeError {
  readonly _tag = "ValidationError" as const;
  override readonly code: C;
  override readonly exitCode: ExitCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  /** Structured validation issues (populated for schema failures) */
  readonly issues: readonly ValidationIssue[];

  constructor(options: PkgforgeErrorOptions<C> & { issues?: readonly ValidationIssue[] });
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
  );
  constructor(
    messageOrOptions: string | (PkgforgeErrorOptions<C> & { issues?: readonly ValidationIssue[] }),
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
  ) {
    if (typeof messageOrOptions === "string") {
      super(messageOrOptions, metadata);
      const code = "VALIDATION_FAILED" as C;
      const entry = getCatalogEntry(code);
      this.code = code;
      this.exitCode = entry.exitCode;
      this.domain = entry.domain;
      this.isExpected = entry.isExpected;
      this.issues = issues ?? [];
    } else {
      const opts = messageOrOptions;
      super(opts.message, opts.metadata, opts.cause !== undefined ? { cause: opts.cause } : undefined);
      const entry = getCatalogEntry(opts.code);
      this.code = opts.code;
      this.exitCode = entry.exitCode;
      this.domain = entry.domain;
      this.isExpected = entry.isExpected;
      this.issues = opts.issues ?? [];
    }
  }
}
