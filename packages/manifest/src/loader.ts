/**
 * Async file-based manifest loader.
 * Reads Cargo.toml from disk and delegates to parseCargoManifest().
 */

import { resolve } from "node:path";

import type { CargoManifest } from "@pkgforge/core";

import { readTextFile } from "./fs-utils.js";
import { type ParseManifestOptions, parseCargoManifest } from "./parser.js";

export type LoadManifestOptions = Omit<ParseManifestOptions, "filePath">;

/**
 * Reads a Cargo.toml file and returns a validated, frozen CargoManifest.
 *
 * @param filePath — path to the manifest (relative or absolute)
 */
export async function loadManifest(
  filePath: string,
  options?: LoadManifestOptions,
): Promise<CargoManifest> {
  const absolutePath = resolve(filePath);
  const content = await readTextFile(absolutePath);
  return parseCargoManifest(content, { ...options, filePath: absolutePath });
}
