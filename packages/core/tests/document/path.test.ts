import { describe, it, expect } from "vitest";
import { childPath, formatPath, ROOT_PATH_LABEL } from "../../src/document/path.js";

describe("formatPath", () => {
  it("renders the root", () => {
    expect(formatPath([])).toBe(ROOT_PATH_LABEL);
    expect(formatPath([])).toBe("$");
  });

  it("joins keys with dots and indices with brackets", () => {
    expect(formatPath(["columns", "geometry", "bbox", 2])).toBe("columns.geometry.bbox[2]");
    expect(formatPath(["columns", "g", "geometry_types", 0])).toBe("columns.g.geometry_types[0]");
  });

  it("quotes keys that would not read back", () => {
    expect(formatPath(["columns", ""])).toBe('columns[""]');
    expect(formatPath(["columns", "a.b"])).toBe('columns["a.b"]');
    expect(formatPath(["columns", "my geom", "crs"])).toBe('columns["my geom"].crs');
  });

  it("renders a leading index", () => {
    expect(formatPath([0, "a"])).toBe("[0].a");
  });
});

describe("childPath", () => {
  it("does not mutate the parent", () => {
    const parent = ["columns"];
    const child = childPath(parent, "geometry");

    expect(child).toEqual(["columns", "geometry"]);
    expect(parent).toEqual(["columns"]);
  });
});
