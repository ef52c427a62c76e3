import { describe, expect, it } from "vitest";
import {
  InternalError,
  ManifestFileNotFoundError,
  ManifestReadError,
  ManifestSchemaError,
  wrapError,
} from "../../index.js";

describe("toJSON", () => {
  it("should serialize catalog fields", () => {
    const json = new ManifestFileNotFoundError("/tmp/Cargo.toml").toJSON();

    expect(json).toMatchObject({
      _tag: "NotFoundError",
      name: "ManifestFileNotFoundError",
      code: "MANIFEST_FILE_NOT_FOUND",
      message: "Manifest file not found: /tmp/Cargo.toml",
      domain: "manifest",
      exitCode: 66,
      isExpected: true,
      metadata: { filePath: "/tmp/Cargo.toml" },
    });
    expect(typeof json.timestamp).toBe("string");
  });

  it("should include the cause message", () => {
    const json = new ManifestReadError("/tmp/Cargo.toml", new Error("EISDIR")).toJSON();
    expect(json.cause).toBe("EISDIR");
    expect(json.message).toBe("Could not read manifest /tmp/Cargo.toml: EISDIR");
  });

  it("should omit metadata and cause when absent", () => {
    const json = new InternalError("boom").toJSON();
    expect("metadata" in json).toBe(false);
    expect("cause" in json).toBe(false);
  });

  it("should survive JSON.stringify", () => {
    const error = new ManifestSchemaError([{ field: "package.name", message: "Required", code: "invalid_type" }]);
    const parsed: unknown = JSON.parse(JSON.stringify(error));
    expect(parsed).toMatchObject({
      code: "MANIFEST_VALIDATION_FAILED",
      message: "Manifest validation failed:\n  - package.name: Required",
      exitCode: 65,
    });
  });

  it("should serialize wrapped foreign errors", () => {
    const json = wrapError(new TypeError("nope")).toJSON();
    expect(json).toMatchObject({
      code: "INTERNAL_ERROR",
      message: "nope",
      metadata: { originalName: "TypeError" },
      cause: "nope",
    });
  });
});
