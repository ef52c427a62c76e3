import { PkgforgeError } from "../base.js";
import { type CodesForBase, type ErrorDomain, type ExitCode, getCatalogEntry } from "../catalog.js";
import type { PkgforgeErrorOptions } from "../types.js";

type ExternalCode = CodesForBase<"ExternalError">;

/**
 * Errors caused by failures outside the process: filesystem reads and writes.
 * Exit 73/74. The `.code` field discriminates the specific error.
 */
export class ExternalError<C extends ExternalCode = "IO_FAILED"> extends PkgforgeError {
  readonly _tag = "ExternalError" as const;
  override readonly code: C;
  override readonly exitCode: ExitCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: PkgforgeErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>);
  constructor(messageOrOptions: string | PkgforgeErrorOptions<C>, metadata?: Record<string, string>) {
    if (typeof messageOrOptions === "string") {
      super(messageOrOptions, metadata);
      const code = "IO_FAILED" as C;
      const entry = getCatalogEntry(code);
      this.code = code;
      this.exitCode = entry.exitCode;
      this.domain = entry.domain;
      this.isExpected = entry.isExpected;
    } else {
      const opts = messageOrOptions;
      super(opts.message, opts.metadata, opts.cause !== undefined ? { cause: opts.cause } : undefined);
      const entry = getCatalogEntry(opts.code);
      this.code = opts.code;
      this.exitCode = entry.exitCode;
      this.domain = entry.domain;
      this.isExpected = entry.isExpected;
    }
  }
}
