/**
 * File I/O for the manifest loader.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import { ManifestFileNotFoundError, ManifestReadError } from "@pkgforge/errors";

/**
 * Reads a UTF-8 manifest file once, stripping a leading BOM.
 *
 * @throws {ManifestFileNotFoundError} if nothing exists at the path
 * @throws {ManifestReadError} for any other read failure
 */
export async function readTextFile(filePath: string): Promise<string> {
  const absolutePath = resolve(filePath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf-8");
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      throw new ManifestFileNotFoundError(absolutePath);
    }
    throw new ManifestReadError(absolutePath, error);
  }

  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
