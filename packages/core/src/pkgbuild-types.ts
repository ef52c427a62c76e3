/**
 * Resolved PKGBUILD configuration and the fixed field table the renderer
 * walks. See `man PKGBUILD` for the meaning of each variable.
 */

/**
 * Fully resolved PKGBUILD record. Every field is present; list fields may be
 * empty and optional scalars (install, changelog) may be "".
 */
export interface ArchConfig {
  /** Rendered as `# Maintainer:` comment lines, not as a variable */
  readonly maintainers: readonly string[];
  readonly pkgname: string;
  /** Upstream version. Hyphens are rewritten to underscores when rendered. */
  readonly pkgver: string;
  /** Arch-specific release number */
  readonly pkgrel: string;
  readonly epoch: string;
  readonly pkgdesc: string;
  /** Project web site */
  readonly url: string;
  readonly license: readonly string[];
  /** Install script shipped with the package */
  readonly install: string;
  readonly changelog: string;
  readonly source: readonly string[];
  /** PGP fingerprints trusted to sign the sources */
  readonly validpgpkeys: readonly string[];
  /** Entries of `source` that makepkg should not unpack */
  readonly noextract: readonly string[];
  readonly md5sums: readonly string[];
  readonly sha1sums: readonly string[];
  readonly sha256sums: readonly string[];
  readonly sha384sums: readonly string[];
  readonly sha512sums: readonly string[];
  readonly groups: readonly string[];
  readonly arch: readonly string[];
  /** Paths (no leading slash) saved as .pacsave on removal */
  readonly backup: readonly string[];
  readonly depends: readonly string[];
  readonly makedepends: readonly string[];
  readonly checkdepends: readonly string[];
  /** `pkg: reason` entries */
  readonly optdepends: readonly string[];
  readonly conflicts: readonly string[];
  readonly provides: readonly string[];
  readonly replaces: readonly string[];
  /** makepkg option toggles such as `!strip` */
  readonly options: readonly string[];
}

/** ArchConfig keys holding a single string */
export type ScalarField = {
  [K in keyof ArchConfig]: ArchConfig[K] extends string ? K : never;
}[keyof ArchConfig];

/** ArchConfig keys rendered as a PKGBUILD array */
export type ArrayField = Exclude<keyof ArchConfig, ScalarField | "maintainers">;

/** Every variable a PKGBUILD line is emitted for */
export type PkgbuildField = ScalarField | ArrayField;

/**
 * How a field's value is written after `name=`:
 * - `bare`: verbatim
 * - `version`: verbatim with `-` replaced by `_`
 * - `quoted`: wrapped in double quotes, no escaping
 * - `array`: `("a", "b")`, `()` when empty
 */
export type PkgbuildFieldSpec =
  | { readonly name: ScalarField; readonly kind: "bare" | "version" | "quoted" }
  | { readonly name: ArrayField; readonly kind: "array" };

/**
 * Emission order of PKGBUILD variables. makepkg-compatible consumers rely on
 * this exact order; do not reorder.
 */
export const PKGBUILD_FIELDS: readonly PkgbuildFieldSpec[] = [
  { name: "pkgname", kind: "bare" },
  { name: "pkgver", kind: "version" },
  { name: "pkgrel", kind: "bare" },
  { name: "epoch", kind: "bare" },
  { name: "pkgdesc", kind: "quoted" },
  { name: "url", kind: "quoted" },
  { name: "license", kind: "array" },
  { name: "install", kind: "quoted" },
  { name: "changelog", kind: "quoted" },
  { name: "source", kind: "array" },
  { name: "validpgpkeys", kind: "array" },
  { name: "noextract", kind: "array" },
  { name: "md5sums", kind: "array" },
  { name: "sha1sums", kind: "array" },
  { name: "sha256sums", kind: "array" },
  { name: "sha384sums", kind: "array" },
  { name: "sha512sums", kind: "array" },
  { name: "groups", kind: "array" },
  { name: "arch", kind: "array" },
  { name: "backup", kind: "array" },
  { name: "depends", kind: "array" },
  { name: "makedepends", kind: "array" },
  { name: "checkdepends", kind: "array" },
  { name: "optdepends", kind: "array" },
  { name: "conflicts", kind: "array" },
  { name: "provides", kind: "array" },
  { name: "replaces", kind: "array" },
  { name: "options", kind: "array" },
];
