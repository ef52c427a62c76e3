import type { ArchConfig } from "./pkgbuild-types.js";

/**
 * `[package.metadata.arch]` — sparse overrides. A present key replaces the
 * value pkgforge would otherwise derive for that PKGBUILD field.
 */
export type ArchMetadata = Partial<ArchConfig>;

/**
 * `[package.metadata]` — only the `arch` table is read; other tools' tables
 * are ignored.
 */
export interface CargoMetadata {
  readonly arch?: ArchMetadata;
}

/**
 * The `[package]` table fields pkgforge reads.
 */
export interface CargoPackage {
  readonly name: string;
  readonly version: string;
  readonly authors: readonly string[];
  readonly description: string;
  /** SPDX-ish expression, alternatives separated by `/` (e.g. `MIT/Apache-2.0`) */
  readonly license: string;
  readonly homepage?: string;
  readonly repository?: string;
  readonly metadata?: CargoMetadata;
}

/**
 * Decoded and validated Cargo.toml.
 */
export interface CargoManifest {
  readonly package: CargoPackage;
}
