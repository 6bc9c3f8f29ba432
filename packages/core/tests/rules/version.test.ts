import { describe, it, expect } from "vitest";
import { isVersionCompatible } from "../../src/rules/version.js";

describe("isVersionCompatible", () => {
  it("matches on major and minor", () => {
    expect(isVersionCompatible("0.5.0", "0.5.0-dev")).toBe(true);
    expect(isVersionCompatible("0.5.2", "0.5.0")).toBe(true);
    expect(isVersionCompatible("1.0.0", "0.5.0-dev")).toBe(false);
    expect(isVersionCompatible("0.4.0", "0.5.0")).toBe(false);
  });

  it("coerces loose document versions", () => {
    expect(isVersionCompatible("0.5", "0.5.0-dev")).toBe(true);
    expect(isVersionCompatible("v1.1", "1.1.0")).toBe(true);
  });

  it("treats unparsable versions as incompatible", () => {
    expect(isVersionCompatible("unknown", "0.5.0")).toBe(false);
    expect(isVersionCompatible("0.5.0", "latest")).toBe(false);
  });
});
