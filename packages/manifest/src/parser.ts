/**
 * Synchronous Cargo.toml parser.
 * Decodes TOML, validates with Zod, and deep-freezes.
 */

import { type CargoManifest, isArchConfigKey } from "@pkgforge/core";
import { ManifestParseError, ManifestSchemaError } from "@pkgforge/errors";
import { parse as parseToml, TomlError } from "smol-toml";

import { deepFreeze } from "./freeze.js";
import { CargoManifestSchema } from "./schema.js";

export interface ParseManifestOptions {
  /** Used in diagnostics only */
  readonly filePath?: string;
  /** Receives non-fatal findings, such as unknown `[package.metadata.arch]` keys */
  readonly onWarning?: (message: string) => void;
}

/**
 * Parses Cargo.toml text into a validated, frozen CargoManifest.
 *
 * Pipeline:
 * 1. Decode TOML
 * 2. Report unknown keys in `[package.metadata.arch]`
 * 3. Validate against the Zod schema
 * 4. Deep freeze result
 */
export function parseCargoManifest(text: string, options?: ParseManifestOptions): CargoManifest {
  const filePath = options?.filePath;

  let decoded: Record<string, unknown>;
  try {
    decoded = parseToml(text);
  } catch (error: unknown) {
    if (error instanceof TomlError) {
      throw new ManifestParseError(filePath, firstLine(error.message), error.line, error.column, error);
    }
    throw new ManifestParseError(filePath, String(error), undefined, undefined, error);
  }

  if (options?.onWarning) {
    for (const key of findUnknownArchKeys(decoded)) {
      options.onWarning(`ignoring unknown key '${key}' in [package.metadata.arch]`);
    }
  }

  const result = CargoManifestSchema.safeParse(decoded);
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      field: i.path.length > 0 ? i.path.join(".") : "(root)",
      message: i.message,
      code: i.code,
    }));
    throw new ManifestSchemaError(issues, result.error);
  }

  const manifest: CargoManifest = deepFreeze(result.data);
  return manifest;
}

/**
 * Keys of `[package.metadata.arch]` that do not name a PKGBUILD field, in
 * document order. Returns [] when the table is absent or not a table.
 */
export function findUnknownArchKeys(decoded: Record<string, unknown>): string[] {
  const arch = getTable(getTable(getTable(decoded, "package"), "metadata"), "arch");
  return arch ? Object.keys(arch).filter((key) => !isArchConfigKey(key)) : [];
}

function getTable(
  parent: Record<string, unknown> | undefined,
  key: string,
): Record<string, unknown> | undefined {
  const value = parent?.[key];
  return isTable(value) ? value : undefined;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// smol-toml appends a code frame to the message; the location is reported separately
function firstLine(message: string): string {
  const newline = message.indexOf("\n");
  return newline === -1 ? message : message.slice(0, newline);
}
