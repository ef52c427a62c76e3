import { join } from "node:path";
import { TemplateNotFoundError } from "@pkgforge/errors";
import { describe, expect, it } from "vitest";
import { getTemplatePath, loadPkgbuildTemplate, TEMPLATE_FILENAME } from "../../template.js";

describe("PKGBUILD template", () => {
  it("lives in the package's templates directory", () => {
    expect(getTemplatePath().endsWith(join("pkgbuild", "templates", TEMPLATE_FILENAME))).toBe(true);
  });

  it("defines build() and package()", () => {
    const template = loadPkgbuildTemplate();
    expect(template.startsWith("build() {\n")).toBe(true);
    expect(template).toContain('    cargo install --root="$pkgdir/usr" --git="$url"\n');
    expect(template.endsWith("}\n")).toBe(true);
  });

  it("returns the same text on repeated loads", () => {
    expect(loadPkgbuildTemplate()).toBe(loadPkgbuildTemplate());
  });

  it("throws TemplateNotFoundError for a missing file", () => {
    const missing = join(getTemplatePath(), "..", "does-not-exist.template");
    expect(() => loadPkgbuildTemplate(missing)).toThrow(TemplateNotFoundError);
  });
});
