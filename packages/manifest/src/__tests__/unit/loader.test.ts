import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import {
  ManifestFileNotFoundError,
  ManifestReadError,
  ManifestSchemaError,
} from "@pkgforge/errors";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadManifest } from "../../loader.js";
import { TOML_WITH_UNKNOWN_ARCH_KEYS, VALID_FULL_TOML, VALID_MINIMAL_TOML } from "../helpers/fixtures.js";

describe("loadManifest", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "pkgforge-manifest-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("loads a valid manifest from disk", async () => {
    const filePath = join(tmpDir, "Cargo.toml");
    await writeFile(filePath, VALID_MINIMAL_TOML, "utf-8");

    const manifest = await loadManifest(filePath);
    expect(manifest.package.name).toBe("demo");
    expect(manifest.package.version).toBe("0.1.0");
  });

  it("loads a full manifest file", async () => {
    const filePath = join(tmpDir, "Cargo.toml");
    await writeFile(filePath, VALID_FULL_TOML, "utf-8");

    const manifest = await loadManifest(filePath);
    expect(manifest.package.license).toBe("MIT/Apache-2.0");
    expect(manifest.package.metadata?.arch?.pkgrel).toBe("3");
  });

  it("strips a UTF-8 byte order mark", async () => {
    const filePath = join(tmpDir, "Cargo.toml");
    await writeFile(filePath, `\uFEFF${VALID_MINIMAL_TOML}`, "utf-8");

    const manifest = await loadManifest(filePath);
    expect(manifest.package.name).toBe("demo");
  });

  it("throws ManifestFileNotFoundError with the absolute path", async () => {
    const missing = join(tmpDir, "nope", "Cargo.toml");
    try {
      await loadManifest(missing);
      expect.fail("should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestFileNotFoundError);
      expect((error as ManifestFileNotFoundError).filePath).toBe(resolve(missing));
    }
  });

  it("throws ManifestReadError when the path is a directory", async () => {
    const dirPath = join(tmpDir, "Cargo.toml");
    await mkdir(dirPath);
    await expect(loadManifest(dirPath)).rejects.toThrow(ManifestReadError);
  });

  it("throws ManifestSchemaError for an empty file", async () => {
    const filePath = join(tmpDir, "Cargo.toml");
    await writeFile(filePath, "", "utf-8");
    await expect(loadManifest(filePath)).rejects.toThrow(ManifestSchemaError);
  });

  it("passes onWarning through to the parser", async () => {
    const filePath = join(tmpDir, "Cargo.toml");
    await writeFile(filePath, TOML_WITH_UNKNOWN_ARCH_KEYS, "utf-8");
    const onWarning = vi.fn();

    await loadManifest(filePath, { onWarning });
    expect(onWarning).toHaveBeenCalledTimes(2);
  });

  it("result is deeply frozen", async () => {
    const filePath = join(tmpDir, "Cargo.toml");
    await writeFile(filePath, VALID_FULL_TOML, "utf-8");

    const manifest = await loadManifest(filePath);
    expect(Object.isFrozen(manifest.package)).toBe(true);
  });
});
