/**
 * @pkgforge/pkgbuild
 *
 * Turns a CargoManifest into PKGBUILD text: resolves every field with its
 * override/fallback chain, renders the fixed line grammar, appends the
 * bundled template, and writes the result.
 */

// ============================================================================
// RESOLUTION
// ============================================================================

export {
  type ArchConfigSources,
  DEFAULT_EPOCH,
  DEFAULT_PKGREL,
  explainArchConfig,
  resolveArchConfig,
  splitLicense,
} from "./resolver.js";
export {
  byDefault,
  describeSource,
  type FieldOrigin,
  type FieldSource,
  firstPresent,
  inherited,
  overridden,
} from "./field-source.js";

// ============================================================================
// RENDERING
// ============================================================================

export { formatPkgbuildLine, quoteList, renderPkgbuild, sanitizePkgver } from "./renderer.js";
export { getTemplatePath, loadPkgbuildTemplate, TEMPLATE_FILENAME } from "./template.js";

// ============================================================================
// OUTPUT
// ============================================================================

export { PKGBUILD_FILENAME, type WritePkgbuildOptions, writePkgbuild } from "./writer.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@pkgforge/pkgbuild";
