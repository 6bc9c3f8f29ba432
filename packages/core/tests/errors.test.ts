import { describe, it, expect } from "vitest";
import {
  GeoMetadataError,
  FormatError,
  RuleSetError,
  isGeoMetadataError,
  getErrorMessage,
  wrapError,
} from "../src/errors.js";

describe("GeoMetadataError", () => {
  it("creates error with message and code", () => {
    const error = new GeoMetadataError("Test message", "TEST_CODE");

    expect(error.message).toBe("Test message");
    expect(error.code).toBe("TEST_CODE");
    expect(error.name).toBe("GeoMetadataError");
    expect(error.suggestion).toBeUndefined();
  });

  it("formats error without suggestion", () => {
    const error = new GeoMetadataError("Test message", "CODE");

    expect(error.format()).toBe("GeoMetadataError: Test message");
  });

  it("formats error with suggestion", () => {
    const error = new GeoMetadataError("Test message", "CODE", { suggestion: "Try this" });

    expect(error.format()).toBe("GeoMetadataError: Test message\n  Suggestion: Try this");
  });

  it("keeps the cause", () => {
    const cause = new Error("root");
    const error = new GeoMetadataError("Outer", "CODE", { cause });

    expect(error.cause).toBe(cause);
    expect(error instanceof Error).toBe(true);
  });
});

describe("FormatError", () => {
  it("uses the default code", () => {
    const error = new FormatError("Bad input");

    expect(error.name).toBe("FormatError");
    expect(error.code).toBe("FORMAT_ERROR");
    expect(error.suggestion).toBeUndefined();
    expect(error instanceof GeoMetadataError).toBe(true);
  });

  it("records position and source", () => {
    const error = new FormatError("Bad input", { code: "MISSING_METADATA_KEY", sourcePath: "a.json", line: 2, column: 4 });

    expect(error.code).toBe("MISSING_METADATA_KEY");
    expect(error.line).toBe(2);
    expect(error.column).toBe(4);
    expect(error.suggestion).toBe("Check the document at: a.json");
  });
});

describe("RuleSetError", () => {
  it("creates error with rule set path", () => {
    const error = new RuleSetError("Broken", { ruleSetPath: "rules.yml" });

    expect(error.name).toBe("RuleSetError");
    expect(error.code).toBe("RULE_SET_ERROR");
    expect(error.ruleSetPath).toBe("rules.yml");
    expect(error.suggestion).toBe("Check the rule set file at: rules.yml");
  });
});

describe("isGeoMetadataError", () => {
  it("returns true for GeoMetadataError", () => {
    expect(isGeoMetadataError(new GeoMetadataError("Test", "CODE"))).toBe(true);
    expect(isGeoMetadataError(new RuleSetError("Test"))).toBe(true);
  });

  it("returns false for other values", () => {
    expect(isGeoMetadataError(new Error("Test"))).toBe(false);
    expect(isGeoMetadataError("error")).toBe(false);
  });
});

describe("getErrorMessage", () => {
  it("reads Error messages and stringifies other values", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
    expect(getErrorMessage(42)).toBe("42");
  });
});

describe("wrapError", () => {
  it("returns GeoMetadataError unchanged", () => {
    const original = new FormatError("Test");

    expect(wrapError(original)).toBe(original);
  });

  it("wraps a regular Error with context", () => {
    const wrapped = wrapError(new Error("Original"), "meta.json");

    expect(wrapped.message).toBe("meta.json: Original");
    expect(wrapped.code).toBe("UNKNOWN_ERROR");
  });

  it("wraps a string", () => {
    expect(wrapError("Something failed").message).toBe("Something failed");
  });
});
