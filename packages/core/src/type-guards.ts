import type { ArchConfig, ArrayField, PkgbuildField, ScalarField } from "./pkgbuild-types.js";
import { PKGBUILD_FIELDS } from "./pkgbuild-types.js";

const SCALAR_FIELDS: ReadonlySet<string> = new Set(
  PKGBUILD_FIELDS.filter((f) => f.kind !== "array").map((f) => f.name),
);

const ARRAY_FIELDS: ReadonlySet<string> = new Set(
  PKGBUILD_FIELDS.filter((f) => f.kind === "array").map((f) => f.name),
);

export function isScalarField(name: string): name is ScalarField {
  return SCALAR_FIELDS.has(name);
}

export function isArrayField(name: string): name is ArrayField {
  return ARRAY_FIELDS.has(name);
}

export function isPkgbuildField(name: string): name is PkgbuildField {
  return isScalarField(name) || isArrayField(name);
}

/** True for every key `[package.metadata.arch]` may set */
export function isArchConfigKey(name: string): name is keyof ArchConfig {
  return name === "maintainers" || isPkgbuildField(name);
}
