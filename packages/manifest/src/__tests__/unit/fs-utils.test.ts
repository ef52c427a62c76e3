import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ManifestFileNotFoundError, ManifestReadError } from "@pkgforge/errors";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { readTextFile } from "../../index.js";

describe("readTextFile", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "pkgforge-read-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("returns the file content", async () => {
    const filePath = join(tmpDir, "Cargo.toml");
    await writeFile(filePath, "[package]\n", "utf-8");
    expect(await readTextFile(filePath)).toBe("[package]\n");
  });

  it("strips a leading BOM only", async () => {
    const filePath = join(tmpDir, "Cargo.toml");
    await writeFile(filePath, "\uFEFF[package]\n\uFEFF", "utf-8");
    expect(await readTextFile(filePath)).toBe("[package]\n\uFEFF");
  });

  it("throws ManifestFileNotFoundError with the absolute path", async () => {
    const filePath = join(tmpDir, "missing", "Cargo.toml");
    const error = await readTextFile(filePath).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ManifestFileNotFoundError);
    if (error instanceof ManifestFileNotFoundError) {
      expect(error.filePath).toBe(filePath);
    }
  });

  it("throws ManifestReadError for a directory", async () => {
    await expect(readTextFile(tmpDir)).rejects.toBeInstanceOf(ManifestReadError);
  });
});
