/**
 * Writes the rendered PKGBUILD.
 *
 * The content goes to a temporary sibling first and is renamed over
 * PKGBUILD, so readers see either the previous file or the complete new one.
 */

import { rename, rm, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";

import { PkgbuildWriteError } from "@pkgforge/errors";

export const PKGBUILD_FILENAME = "PKGBUILD";

export interface WritePkgbuildOptions {
  /** Output directory. Default: process.cwd() */
  readonly dir?: string;
}

/**
 * Writes `content` to `<dir>/PKGBUILD`, replacing any existing file.
 *
 * @returns the absolute path written
 * @throws {PkgbuildWriteError} if the file cannot be created or renamed
 */
export async function writePkgbuild(content: string, options?: WritePkgbuildOptions): Promise<string> {
  const dir = resolve(options?.dir ?? process.cwd());
  const target = join(dir, PKGBUILD_FILENAME);
  const temp = join(dir, `.${PKGBUILD_FILENAME}.${process.pid}.tmp`);

  try {
    await writeFile(temp, content, "utf-8");
    await rename(temp, target);
  } catch (error: unknown) {
    // a failed cleanup must not mask the write failure
    await rm(temp, { force: true }).catch(() => undefined);
    throw new PkgbuildWriteError(target, error);
  }

  return target;
}
