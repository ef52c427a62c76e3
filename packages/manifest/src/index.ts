/**
 * @pkgforge/manifest
 *
 * Cargo.toml loader for pkgforge.
 * Locates and reads the manifest, decodes TOML, validates it with Zod, and
 * returns a typed, frozen CargoManifest.
 */

// ============================================================================
// PRIMARY API
// ============================================================================

export { type LoadManifestOptions, loadManifest } from "./loader.js";
export {
  type LocateManifestOptions,
  locateManifest,
  MANIFEST_DIR_ENV,
  MANIFEST_FILENAME,
} from "./locate.js";
export { findUnknownArchKeys, type ParseManifestOptions, parseCargoManifest } from "./parser.js";

// ============================================================================
// SCHEMA
// ============================================================================

export {
  ArchMetadataSchema,
  CargoManifestSchema,
  CargoMetadataSchema,
  CargoPackageSchema,
} from "./schema.js";

// ============================================================================
// UTILITIES
// ============================================================================

export { type DeepReadonly, deepFreeze } from "./freeze.js";
export { readTextFile } from "./fs-utils.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@pkgforge/manifest";
