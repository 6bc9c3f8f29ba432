import { describe, it, expect } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

const packagesDir = fileURLToPath(new URL("../..", import.meta.url));

function readManifest(name: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(fs.readFileSync(path.join(packagesDir, name, "package.json"), "utf-8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${name}/package.json is not an object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

for (const name of ["core", "conformance", "cli"]) {
  describe(`${name} package`, () => {
    const manifest = readManifest(name);

    it("resolves to compiled output by default and to sources in development", () => {
      expect(manifest.exports).toEqual({
        ".": {
          development: "./src/index.ts",
          types: "./src/index.ts",
          default: "./dist/index.js",
        },
      });
      expect(fs.existsSync(path.join(packagesDir, name, "src", "index.ts"))).toBe(true);
    });

    it("builds src into dist", () => {
      const tsconfig: unknown = JSON.parse(fs.readFileSync(path.join(packagesDir, name, "tsconfig.json"), "utf-8"));

      expect(tsconfig).toMatchObject({ compilerOptions: { composite: true, rootDir: "src", outDir: "dist" } });
      expect(manifest.files).toContain("dist");
    });
  });
}

describe("cli package manifest", () => {
  it("points the bin at the compiled entry of an existing source", () => {
    const manifest = readManifest("cli");

    expect(manifest.bin).toEqual({ "geoparquet-lint": "./dist/bin/geoparquet-lint.js" });
    expect(fs.existsSync(path.join(packagesDir, "cli", "src", "bin", "geoparquet-lint.ts"))).toBe(true);
  });
});

describe("core package manifest", () => {
  it("ships the bundled rule file", () => {
    const manifest = readManifest("core");

    expect(manifest.files).toContain("rules");
    expect(fs.existsSync(path.join(packagesDir, "core", "rules", "geo-metadata.rules.yml"))).toBe(true);
  });
});
