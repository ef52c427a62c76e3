import { PkgforgeError } from "../base.js";
import { type CodesForBase, type ErrorDomain, type ExitCode, getCatalogEntry } from "../catalog.js";
import type { PkgforgeErrorOptions } from "../types.js";

type NotFoundCode = CodesForBase<"NotFoundError">;

/**
 * Errors when a required file or resource does not exist.
 * Exit 66. The `.code` field discriminates the specific error.
 */
export class NotFoundError<C extends NotFoundCode = "RESOURCE_NOT_FOUND"> extends PkgforgeError {
  readonly _tag = "NotFoundError" as const;
  override readonly code: C;
  override readonly exitCode: ExitCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: PkgforgeErrorOptions<C>);
  constructor(resourceType: string, resourceId: string, metadata?: Record<string, string>);
  constructor(
    resourceTypeOrOptions: string | PkgforgeErrorOptions<C>,
    resourceId?: string,
    metadata?: Record<string, string>,
  ) {
    if (typeof resourceTypeOrOptions === "string") {
      super(`${resourceTypeOrOptions} '${resourceId}' not found`, metadata);
      const code = "RESOURCE_NOT_FOUND" as C;
      const entry = getCatalogEntry(code);
      this.code = code;
      this.exitCode = entry.exitCode;
      this.domain = entry.domain;
      this.isExpected = entry.isExpected;
    } else {
      const opts = resourceTypeOrOptions;
      super(opts.message, opts.metadata, opts.cause !== undefined ? { cause: opts.cause } : undefined);
      const entry = getCatalogEntry(opts.code);
      this.code = opts.code;
      this.exitCode = entry.exitCode;
      this.domain = entry.domain;
      this.isExpected = entry.isExpected;
    }
  }
}
