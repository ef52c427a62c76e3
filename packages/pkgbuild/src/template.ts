/**
 * Bundled PKGBUILD boilerplate (build() and package() functions), appended
 * verbatim after the generated variables.
 */

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { TemplateNotFoundError } from "@pkgforge/errors";

export const TEMPLATE_FILENAME = "PKGBUILD.template";

/**
 * Absolute path of the bundled template.
 */
export function getTemplatePath(): string {
  const currentDir = dirname(fileURLToPath(import.meta.url));
  // src/ -> packages/pkgbuild/templates/
  return resolve(currentDir, "..", "templates", TEMPLATE_FILENAME);
}

const cache = new Map<string, string>();

/**
 * Reads a template once per process.
 *
 * @throws {TemplateNotFoundError} if the file is missing from the installation
 */
export function loadPkgbuildTemplate(templatePath: string = getTemplatePath()): string {
  const hit = cache.get(templatePath);
  if (hit !== undefined) {
    return hit;
  }

  let content: string;
  try {
    content = readFileSync(templatePath, "utf-8");
  } catch (error: unknown) {
    throw new TemplateNotFoundError(templatePath, error);
  }

  cache.set(templatePath, content);
  return content;
}
