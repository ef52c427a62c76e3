/**
 * Zod schemas for the parts of Cargo.toml that feed the PKGBUILD.
 */

import type { ArchMetadata, CargoManifest } from "@pkgforge/core";
import { z } from "zod";

const StringListSchema = z.array(z.string());

/**
 * `[package.metadata.arch]`. Every key is optional; unknown keys are
 * stripped (the parser reports them as warnings).
 */
export const ArchMetadataSchema = z.object({
  maintainers: StringListSchema.optional(),
  pkgname: z.string().optional(),
  pkgver: z.string().optional(),
  pkgrel: z.string().optional(),
  epoch: z.string().optional(),
  pkgdesc: z.string().optional(),
  url: z.string().optional(),
  license: StringListSchema.optional(),
  install: z.string().optional(),
  changelog: z.string().optional(),
  source: StringListSchema.optional(),
  validpgpkeys: StringListSchema.optional(),
  noextract: StringListSchema.optional(),
  md5sums: StringListSchema.optional(),
  sha1sums: StringListSchema.optional(),
  sha256sums: StringListSchema.optional(),
  sha384sums: StringListSchema.optional(),
  sha512sums: StringListSchema.optional(),
  groups: StringListSchema.optional(),
  arch: StringListSchema.optional(),
  backup: StringListSchema.optional(),
  depends: StringListSchema.optional(),
  makedepends: StringListSchema.optional(),
  checkdepends: StringListSchema.optional(),
  optdepends: StringListSchema.optional(),
  conflicts: StringListSchema.optional(),
  provides: StringListSchema.optional(),
  replaces: StringListSchema.optional(),
  options: StringListSchema.optional(),
});

export const CargoMetadataSchema = z.object({
  arch: ArchMetadataSchema.optional(),
});

/**
 * `[package]`. name, version, authors, description and license have no
 * fallback anywhere in the resolution policy, so they are required here.
 */
export const CargoPackageSchema = z.object({
  name: z.string(),
  version: z.string(),
  authors: StringListSchema,
  description: z.string(),
  license: z.string(),
  homepage: z.string().optional(),
  repository: z.string().optional(),
  metadata: CargoMetadataSchema.optional(),
});

export const CargoManifestSchema = z.object({
  package: CargoPackageSchema,
});

/**
 * Compile-time assertion: the schemas cover exactly the keys of the core
 * types, so a field added on one side cannot be forgotten on the other.
 */
type _ArchKeys = keyof z.infer<typeof ArchMetadataSchema>;
type _ArchCheck = _ArchKeys extends keyof ArchMetadata
  ? keyof ArchMetadata extends _ArchKeys
    ? true
    : never
  : never;
type _PackageKeys = keyof z.infer<typeof CargoPackageSchema>;
type _PackageCheck = _PackageKeys extends keyof CargoManifest["package"]
  ? keyof CargoManifest["package"] extends _PackageKeys
    ? true
    : never
  : never;
const _assertKeys: _ArchCheck & _PackageCheck = true;
void _assertKeys;
