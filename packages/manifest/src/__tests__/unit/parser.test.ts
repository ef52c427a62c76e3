import { ManifestParseError, ManifestSchemaError } from "@pkgforge/errors";
import { describe, expect, it, vi } from "vitest";
import { findUnknownArchKeys, parseCargoManifest } from "../../parser.js";
import {
  INVALID_TOML_SYNTAX,
  TOML_MISSING_REQUIRED,
  TOML_WITH_OTHER_METADATA,
  TOML_WITH_UNKNOWN_ARCH_KEYS,
  TOML_WRONG_TYPES,
  VALID_FULL_TOML,
  VALID_MINIMAL_TOML,
} from "../helpers/fixtures.js";

describe("parseCargoManifest", () => {
  it("parses a minimal manifest", () => {
    const manifest = parseCargoManifest(VALID_MINIMAL_TOML);
    expect(manifest.package).toEqual({
      name: "demo",
      version: "0.1.0",
      authors: ["A <a@x.com>"],
      description: "d",
      license: "MIT",
    });
  });

  it("parses the arch metadata table", () => {
    const manifest = parseCargoManifest(VALID_FULL_TOML);
    expect(manifest.package.homepage).toBe("https://example.com/rg-lite");
    expect(manifest.package.repository).toBe("https://git.example.com/rg-lite");
    expect(manifest.package.metadata?.arch).toEqual({
      pkgrel: "3",
      arch: ["x86_64", "aarch64"],
      depends: ["glibc"],
      makedepends: ["cargo"],
      source: ["rg-lite-1.2.0.tar.gz"],
      sha256sums: ["SKIP"],
    });
  });

  it("drops Cargo keys it does not use", () => {
    const manifest = parseCargoManifest(VALID_FULL_TOML);
    expect(Object.keys(manifest)).toEqual(["package"]);
    expect("edition" in manifest.package).toBe(false);
  });

  it("accepts metadata tables of other tools", () => {
    const manifest = parseCargoManifest(TOML_WITH_OTHER_METADATA);
    expect(manifest.package.metadata).toEqual({});
  });

  it("returns a deeply frozen result", () => {
    const manifest = parseCargoManifest(VALID_FULL_TOML);
    expect(Object.isFrozen(manifest)).toBe(true);
    expect(Object.isFrozen(manifest.package.authors)).toBe(true);
    expect(Object.isFrozen(manifest.package.metadata?.arch)).toBe(true);
  });

  it("throws ManifestParseError for invalid TOML", () => {
    expect(() => parseCargoManifest(INVALID_TOML_SYNTAX)).toThrow(ManifestParseError);
  });

  it("includes the line and file path in ManifestParseError", () => {
    try {
      parseCargoManifest(INVALID_TOML_SYNTAX, { filePath: "/w/Cargo.toml" });
      expect.fail("should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestParseError);
      const parseErr = error as ManifestParseError;
      expect(parseErr.line).toBeTypeOf("number");
      expect(parseErr.filePath).toBe("/w/Cargo.toml");
      expect(parseErr.message.startsWith("Could not decode manifest (/w/Cargo.toml) at line ")).toBe(
        true,
      );
    }
  });

  it("lists every missing required field", () => {
    try {
      parseCargoManifest(TOML_MISSING_REQUIRED);
      expect.fail("should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestSchemaError);
      const fields = (error as ManifestSchemaError).issues.map((i) => i.field);
      expect(fields).toEqual(["package.authors", "package.description", "package.license"]);
    }
  });

  it("reports a missing [package] table", () => {
    try {
      parseCargoManifest('[workspace]\nmembers = ["a"]\n');
      expect.fail("should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestSchemaError);
      expect((error as ManifestSchemaError).issues).toEqual([
        { field: "package", message: "Required", code: "invalid_type" },
      ]);
    }
  });

  it("rejects fields of the wrong type", () => {
    try {
      parseCargoManifest(TOML_WRONG_TYPES);
      expect.fail("should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestSchemaError);
      const fields = (error as ManifestSchemaError).issues.map((i) => i.field);
      expect(fields).toEqual(["package.authors", "package.metadata.arch.depends"]);
    }
  });

  it("throws ManifestSchemaError for an empty document", () => {
    expect(() => parseCargoManifest("")).toThrow(ManifestSchemaError);
  });

  it("warns about unknown arch keys", () => {
    const onWarning = vi.fn();
    parseCargoManifest(TOML_WITH_UNKNOWN_ARCH_KEYS, { onWarning });
    expect(onWarning.mock.calls).toEqual([
      ["ignoring unknown key 'pkgdescr' in [package.metadata.arch]"],
      ["ignoring unknown key 'makedeps' in [package.metadata.arch]"],
    ]);
  });

  it("does not warn for a clean manifest", () => {
    const onWarning = vi.fn();
    parseCargoManifest(VALID_FULL_TOML, { onWarning });
    expect(onWarning).not.toHaveBeenCalled();
  });
});

describe("findUnknownArchKeys", () => {
  it("returns [] without an arch table", () => {
    expect(findUnknownArchKeys({ package: { name: "x" } })).toEqual([]);
    expect(findUnknownArchKeys({})).toEqual([]);
  });

  it("returns [] when arch is not a table", () => {
    expect(findUnknownArchKeys({ package: { metadata: { arch: ["x"] } } })).toEqual([]);
  });

  it("keeps maintainers as a known key", () => {
    expect(
      findUnknownArchKeys({ package: { metadata: { arch: { maintainers: [], bogus: 1 } } } }),
    ).toEqual(["bogus"]);
  });
});
