/**
 * PKGBUILD text rendering.
 *
 * Output layout:
 *
 *     # Maintainer: <name>        (one per maintainer)
 *     <blank>
 *     <field>=<value>             (PKGBUILD_FIELDS order)
 *     <blank>
 *     <template>
 *
 * Values are written verbatim inside their quotes. Embedded `"` or newlines
 * are not escaped.
 */

import { type ArchConfig, PKGBUILD_FIELDS, type PkgbuildFieldSpec } from "@pkgforge/core";

import { loadPkgbuildTemplate } from "./template.js";

/** `["a", "b"]` → `"a", "b"`; `[]` → `` */
export function quoteList(values: readonly string[]): string {
  return values.map((value) => `"${value}"`).join(", ");
}

/** makepkg rejects `-` in pkgver */
export function sanitizePkgver(version: string): string {
  return version.replace(/-/g, "_");
}

/**
 * One `name=value` line (without trailing newline).
 */
export function formatPkgbuildLine(field: PkgbuildFieldSpec, config: ArchConfig): string {
  switch (field.kind) {
    case "bare":
      return `${field.name}=${config[field.name]}`;
    case "version":
      return `${field.name}=${sanitizePkgver(config[field.name])}`;
    case "quoted":
      return `${field.name}="${config[field.name]}"`;
    case "array":
      return `${field.name}=(${quoteList(config[field.name])})`;
  }
}

/**
 * Renders the complete PKGBUILD. Pure for a given template; identical input
 * yields identical output.
 *
 * @param template - boilerplate appended after the fields; defaults to the bundled template
 */
export function renderPkgbuild(config: ArchConfig, template: string = loadPkgbuildTemplate()): string {
  const lines = [
    ...config.maintainers.map((maintainer) => `# Maintainer: ${maintainer}`),
    "",
    ...PKGBUILD_FIELDS.map((field) => formatPkgbuildLine(field, config)),
    "",
  ];
  return `${lines.join("\n")}\n${template}`;
}
