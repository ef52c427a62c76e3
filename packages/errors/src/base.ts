import type { BaseErrorType, ErrorCode, ErrorDomain, ExitCode } from "./catalog.js";

/**
 * Plain-object form of a PkgforgeError, as printed by `--verbose` diagnostics.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly exitCode: ExitCode;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Readonly<Record<string, string>>;
  readonly cause?: string;
}

/**
 * Root of the pkgforge error hierarchy.
 *
 * Concrete classes fill in `code`, `exitCode`, `domain` and `isExpected`
 * from the catalog entry of their code.
 */
export abstract class PkgforgeError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly exitCode: ExitCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly timestamp: Date;
  readonly metadata: Readonly<Record<string, string>> | undefined;

  constructor(message: string, metadata?: Record<string, string>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      exitCode: this.exitCode,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
    };
  }
}

/**
 * Check if a value is a PkgforgeError
 */
export function isPkgforgeError(error: unknown): error is PkgforgeError {
  return error instanceof PkgforgeError;
}

/**
 * Check if a value is an Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
