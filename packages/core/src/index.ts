/**
 * @pkgforge/core
 *
 * Shared types for the manifest loader, resolver and renderer.
 */

export const PACKAGE_NAME = "@pkgforge/core" as const;

export type {
  ArchMetadata,
  CargoManifest,
  CargoMetadata,
  CargoPackage,
} from "./manifest-types.js";
export {
  type ArchConfig,
  type ArrayField,
  PKGBUILD_FIELDS,
  type PkgbuildField,
  type PkgbuildFieldSpec,
  type ScalarField,
} from "./pkgbuild-types.js";
export { isArchConfigKey, isArrayField, isPkgbuildField, isScalarField } from "./type-guards.js";
