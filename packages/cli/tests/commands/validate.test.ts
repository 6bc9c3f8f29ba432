import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import chalk from "chalk";
import { expandInputs, runValidate } from "../../src/commands/validate.js";
import { setLogLevel, setLogSink } from "../../src/utils/log.js";

const minimal = {
  version: "0.5.0-dev",
  primary_column: "geometry",
  columns: { geometry: { encoding: "WKB", geometry_types: [] } },
};

describe("runValidate", () => {
  let tempDir: string;
  let output: string[];
  let logs: string[];
  const previousLevel = chalk.level;
  const io = () => ({ write: (text: string) => output.push(text), env: {} });

  async function writeFile(name: string, content: unknown): Promise<string> {
    const file = path.join(tempDir, name);
    await fs.promises.writeFile(file, typeof content === "string" ? content : JSON.stringify(content));
    return file;
  }

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "validate-test-"));
    output = [];
    logs = [];
    chalk.level = 0;
    setLogSink((line) => logs.push(line));
  });

  afterEach(async () => {
    chalk.level = previousLevel;
    setLogSink();
    setLogLevel("warn");
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it("passes a valid document", async () => {
    const file = await writeFile("ok.json", minimal);

    expect(await runValidate([file], {}, io())).toBe(0);
    expect(output).toEqual([`PASS ${file}`]);
    expect(logs).toEqual([]);
  });

  it("lists the violations of an invalid document", async () => {
    const file = await writeFile("bad.json", {
      ...minimal,
      columns: { geometry: { encoding: "WKT", geometry_types: [] } },
    });

    expect(await runValidate([file], {}, io())).toBe(1);
    expect(output).toEqual([
      [
        `FAIL ${file} (1 violation)`,
        "  - columns.geometry.encoding: expected one of [WKB], found 'WKT'. Name of the geometry encoding format. Currently only 'WKB' is supported.",
      ].join("\n"),
    ]);
  });

  it("accepts a file saved with a byte order mark", async () => {
    const file = await writeFile("bom.json", `\uFEFF${JSON.stringify(minimal)}`);

    expect(await runValidate([file], {}, io())).toBe(0);
    expect(output).toEqual([`PASS ${file}`]);
  });

  it("reports unparsable input as an error", async () => {
    const file = await writeFile("broken.json", "{");

    expect(await runValidate([file], {}, io())).toBe(2);
    expect(output[0]).toMatch(/^ERROR .*broken\.json\n {2}FormatError: Invalid JSON: /);
  });

  it("reports a missing file as an error", async () => {
    const file = path.join(tempDir, "missing.json");

    expect(await runValidate([file], { json: true }, io())).toBe(2);
    expect(JSON.parse(output[0] ?? "")).toEqual([
      { file, valid: false, error: { code: "READ_ERROR", message: expect.stringMatching(/^Failed to read /) } },
    ]);
  });

  it("reads YAML by extension", async () => {
    const file = await writeFile(
      "meta.yaml",
      "version: 0.5.0-dev\nprimary_column: geometry\ncolumns:\n  geometry:\n    encoding: WKB\n    geometry_types: [Point Z]\n",
    );

    expect(await runValidate([file], {}, io())).toBe(0);
  });

  it("unwraps the metadata under a key", async () => {
    const file = await writeFile("fixture.json", { geo: minimal });

    expect(await runValidate([file], { key: "geo" }, io())).toBe(0);
    expect(await runValidate([file], {}, io())).toBe(1);
  });

  it("fails when the key is missing", async () => {
    const file = await writeFile("plain.json", minimal);

    expect(await runValidate([file], { key: "geo", json: true }, io())).toBe(2);
    expect(JSON.parse(output[0] ?? "")).toEqual([
      { file, valid: false, error: { code: "MISSING_METADATA_KEY", message: 'Document has no "geo" entry.' } },
    ]);
  });

  it("takes the key from the environment", async () => {
    const file = await writeFile("fixture.json", { geo: minimal });

    expect(await runValidate([file], {}, { write: (text) => output.push(text), env: { GEOPARQUET_LINT_KEY: "geo" } })).toBe(
      0,
    );
  });

  it("writes JSON results", async () => {
    const file = await writeFile("types.json", {
      ...minimal,
      columns: { geometry: { encoding: "WKB", geometry_types: "Point" } },
    });

    expect(await runValidate([file], { json: true }, io())).toBe(1);
    expect(JSON.parse(output[0] ?? "")).toEqual([
      {
        file,
        valid: false,
        diagnostics: [
          {
            path: "columns.geometry.geometry_types",
            message: "expected array, found 'Point'",
            ruleId: "geometry-types-type",
            category: "type",
          },
        ],
      },
    ]);
  });

  it("returns the most severe exit code across files", async () => {
    const ok = await writeFile("a.json", minimal);
    const bad = await writeFile("b.json", { ...minimal, version: 1 });
    const broken = await writeFile("c.json", "");

    expect(await runValidate([ok, bad], {}, io())).toBe(1);
    expect(await runValidate([ok, bad, broken], {}, io())).toBe(2);
  });

  it("warns about a document version from another schema revision", async () => {
    const file = await writeFile("v1.json", { ...minimal, version: "1.0.0" });

    expect(await runValidate([file], {}, io())).toBe(0);
    expect(logs).toEqual([`warn ${file}: document version 1.0.0 does not match rule set version 0.5.0-dev.`]);
  });

  it("validates against a rule file", async () => {
    const rules = await writeFile("rules.yml", "id: custom\nversion: 1.0.0\nconstraints:\n  - id: needs-name\n    kind: required\n    properties: [name]\n");
    const file = await writeFile("doc.json", { name: "x", version: "1.0.0" });

    expect(await runValidate([file], { rules }, io())).toBe(0);
    expect(await runValidate([file], {}, io())).toBe(1);
  });

  it("stops with an error when the rule file cannot be loaded", async () => {
    const file = await writeFile("doc.json", minimal);

    expect(await runValidate([file], { rules: path.join(tempDir, "none.yml") }, io())).toBe(2);
    expect(output).toEqual([]);
    expect(logs[0]).toMatch(/^error RuleSetError: Failed to read rule set file: /);
  });

  it("rejects an unknown format", async () => {
    const file = await writeFile("doc.json", minimal);

    expect(await runValidate([file], { format: "toml" }, io())).toBe(2);
    expect(logs).toEqual(['error GeoMetadataError: Unknown format "toml".\n  Suggestion: Use json or yaml']);
  });
});

describe("expandInputs", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "expand-test-"));
  });

  afterEach(async () => {
    setLogSink();
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it("expands glob patterns in sorted order", async () => {
    for (const name of ["b.json", "a.json", "c.yml"]) {
      await fs.promises.writeFile(path.join(tempDir, name), "{}");
    }

    expect(await expandInputs([path.join(tempDir, "*.json")])).toEqual([
      path.join(tempDir, "a.json"),
      path.join(tempDir, "b.json"),
    ]);
  });

  it("keeps plain paths as given", async () => {
    expect(await expandInputs(["does-not-exist.json"])).toEqual(["does-not-exist.json"]);
  });

  it("warns when a pattern matches nothing", async () => {
    const logs: string[] = [];
    setLogSink((line) => logs.push(line));
    const pattern = path.join(tempDir, "*.parquet");

    expect(await expandInputs([pattern])).toEqual([]);
    expect(logs).toHaveLength(1);
    expect(logs[0]).toContain(`No files match "${pattern}".`);
  });
});
