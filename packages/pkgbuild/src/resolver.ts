/**
 * Resolves the complete PKGBUILD configuration from a Cargo manifest.
 *
 * Each field is the first present of:
 * 1. `[package.metadata.arch]` override
 * 2. the matching `[package]` value(s), in chain order
 * 3. a fixed default
 *
 * Fields never depend on each other's resolved values.
 */

import type { ArchConfig, ArchMetadata, CargoManifest } from "@pkgforge/core";
import { deepFreeze } from "@pkgforge/manifest";

import { byDefault, type FieldSource, firstPresent, inherited, overridden } from "./field-source.js";

export const DEFAULT_PKGREL = "1";
export const DEFAULT_EPOCH = "0";

/** Where each ArchConfig field came from, alongside its value */
export type ArchConfigSources = {
  readonly [K in keyof ArchConfig]: FieldSource<ArchConfig[K]>;
};

/**
 * Splits a Cargo license expression on `/`, trimming each part.
 * `"MIT/Apache-2.0"` → `["MIT", "Apache-2.0"]`; no `/` → one element.
 */
export function splitLicense(license: string): readonly string[] {
  return license.split("/").map((part) => part.trim());
}

function scalarOr(value: string | undefined, fallback: string): FieldSource<string> {
  return firstPresent([overridden(value)], byDefault(fallback));
}

function listOrEmpty(value: readonly string[] | undefined): FieldSource<readonly string[]> {
  return firstPresent([overridden(value)], byDefault<readonly string[]>([]));
}

/**
 * Resolves every field and reports its origin.
 */
export function explainArchConfig(manifest: CargoManifest): ArchConfigSources {
  const pkg = manifest.package;
  const arch: ArchMetadata = pkg.metadata?.arch ?? {};

  return {
    maintainers: firstPresent([overridden(arch.maintainers)], inherited("authors", pkg.authors)),
    pkgname: firstPresent([overridden(arch.pkgname)], inherited("name", pkg.name)),
    pkgver: firstPresent([overridden(arch.pkgver)], inherited("version", pkg.version)),
    pkgrel: scalarOr(arch.pkgrel, DEFAULT_PKGREL),
    epoch: scalarOr(arch.epoch, DEFAULT_EPOCH),
    pkgdesc: firstPresent([overridden(arch.pkgdesc)], inherited("description", pkg.description)),
    url: firstPresent(
      [
        overridden(arch.url),
        inherited("homepage", pkg.homepage),
        inherited("repository", pkg.repository),
      ],
      byDefault(""),
    ),
    license: firstPresent(
      [overridden(arch.license)],
      inherited("license", splitLicense(pkg.license)),
    ),
    install: scalarOr(arch.install, ""),
    changelog: scalarOr(arch.changelog, ""),
    source: listOrEmpty(arch.source),
    validpgpkeys: listOrEmpty(arch.validpgpkeys),
    noextract: listOrEmpty(arch.noextract),
    md5sums: listOrEmpty(arch.md5sums),
    sha1sums: listOrEmpty(arch.sha1sums),
    sha256sums: listOrEmpty(arch.sha256sums),
    sha384sums: listOrEmpty(arch.sha384sums),
    sha512sums: listOrEmpty(arch.sha512sums),
    groups: listOrEmpty(arch.groups),
    arch: listOrEmpty(arch.arch),
    backup: listOrEmpty(arch.backup),
    depends: listOrEmpty(arch.depends),
    makedepends: listOrEmpty(arch.makedepends),
    checkdepends: listOrEmpty(arch.checkdepends),
    optdepends: listOrEmpty(arch.optdepends),
    conflicts: listOrEmpty(arch.conflicts),
    provides: listOrEmpty(arch.provides),
    replaces: listOrEmpty(arch.replaces),
    options: listOrEmpty(arch.options),
  };
}

/**
 * Resolves the frozen ArchConfig the renderer consumes.
 */
export function resolveArchConfig(manifest: CargoManifest): ArchConfig {
  const s = explainArchConfig(manifest);

  return deepFreeze({
    maintainers: s.maintainers.value,
    pkgname: s.pkgname.value,
    pkgver: s.pkgver.value,
    pkgrel: s.pkgrel.value,
    epoch: s.epoch.value,
    pkgdesc: s.pkgdesc.value,
    url: s.url.value,
    license: s.license.value,
    install: s.install.value,
    changelog: s.changelog.value,
    source: s.source.value,
    validpgpkeys: s.validpgpkeys.value,
    noextract: s.noextract.value,
    md5sums: s.md5sums.value,
    sha1sums: s.sha1sums.value,
    sha256sums: s.sha256sums.value,
    sha384sums: s.sha384sums.value,
    sha512sums: s.sha512sums.value,
    groups: s.groups.value,
    arch: s.arch.value,
    backup: s.backup.value,
    depends: s.depends.value,
    makedepends: s.makedepends.value,
    checkdepends: s.checkdepends.value,
    optdepends: s.optdepends.value,
    conflicts: s.conflicts.value,
    provides: s.provides.value,
    replaces: s.replaces.value,
    options: s.options.value,
  });
}
