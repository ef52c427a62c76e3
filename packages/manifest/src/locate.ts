/**
 * Finds the Cargo.toml to read.
 *
 * Resolution order:
 * 1. explicit path (a directory, or a path ending in Cargo.toml)
 * 2. $CARGO_MANIFEST_DIR
 * 3. the current directory
 */

import { basename, join, resolve } from "node:path";

export const MANIFEST_FILENAME = "Cargo.toml";
export const MANIFEST_DIR_ENV = "CARGO_MANIFEST_DIR";

export interface LocateManifestOptions {
  readonly manifestPath?: string | undefined;
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** Base for relative paths. Default: process.cwd() */
  readonly cwd?: string;
}

/**
 * Returns the absolute path of the manifest file. Does not touch the
 * filesystem; a missing file surfaces when it is read.
 */
export function locateManifest(options?: LocateManifestOptions): string {
  const cwd = options?.cwd ?? process.cwd();
  const env = options?.env ?? process.env;

  const explicit = options?.manifestPath;
  if (explicit !== undefined && explicit !== "") {
    if (basename(explicit) === MANIFEST_FILENAME) {
      return resolve(cwd, explicit);
    }
    return resolve(cwd, join(explicit, MANIFEST_FILENAME));
  }

  const dir = env[MANIFEST_DIR_ENV];
  if (dir !== undefined && dir !== "") {
    return resolve(cwd, dir, MANIFEST_FILENAME);
  }

  return resolve(cwd, MANIFEST_FILENAME);
}
