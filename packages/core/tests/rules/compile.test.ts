import { describe, it, expect } from "vitest";
import { compileRuleSet, type CompileOptions } from "../../src/rules/compile.js";
import { RuleSetError } from "../../src/errors.js";
import type { Predicate } from "../../src/rules/types.js";

function compileError(raw: unknown, options: CompileOptions = {}): RuleSetError {
  try {
    compileRuleSet(raw, options);
  } catch (error) {
    if (error instanceof RuleSetError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected compileRuleSet to fail");
}

describe("compileRuleSet", () => {
  it("compiles constraints and nested scopes", () => {
    const ruleSet = compileRuleSet({
      id: "test",
      version: "1.0.0",
      constraints: [{ id: "root-required", kind: "required", properties: ["a"] }],
      scopes: [
        {
          target: "items[*]",
          constraints: [{ id: "item-type", kind: "type", type: ["string", "null"], category: "structural" }],
        },
      ],
    });

    expect(ruleSet.id).toBe("test");
    expect(ruleSet.version).toBe("1.0.0");
    expect(ruleSet.root.target).toEqual([]);
    expect(ruleSet.root.constraints[0]).toMatchObject({ id: "root-required", kind: "required", properties: ["a"] });
    expect(ruleSet.root.scopes[0]?.target).toEqual([{ type: "key", key: "items" }, { type: "any-index" }]);
    expect(ruleSet.root.scopes[0]?.constraints[0]).toMatchObject({
      kind: "type",
      types: ["string", "null"],
      category: "structural",
    });
  });

  it("accepts a single type as a string", () => {
    const ruleSet = compileRuleSet({
      id: "test",
      version: "1.0.0",
      constraints: [{ id: "t", target: "x", kind: "type", type: "number" }],
    });

    expect(ruleSet.root.constraints[0]).toMatchObject({ types: ["number"], target: [{ type: "key", key: "x" }] });
  });

  it("freezes the result", () => {
    const ruleSet = compileRuleSet({
      id: "test",
      version: "1.0.0",
      constraints: [{ id: "e", kind: "enum", values: ["a"] }],
    });

    expect(Object.isFrozen(ruleSet)).toBe(true);
    expect(Object.isFrozen(ruleSet.root.constraints)).toBe(true);
    expect(Object.isFrozen(ruleSet.root.constraints[0])).toBe(true);
  });

  it("rejects a definition that does not match the schema", () => {
    const error = compileError({ id: "test", version: "1.0.0", constraints: [{ id: "m", kind: "min-length", min: -1 }] });

    expect(error.message).toMatch(/^Invalid rule set definition: constraints\.0\.min: /);
  });

  it("rejects an unknown constraint kind", () => {
    const error = compileError({ id: "test", version: "1.0.0", constraints: [{ id: "x", kind: "regex" }] });

    expect(error.message).toMatch(/^Invalid rule set definition: constraints\.0\.kind: /);
  });

  it("rejects a version that is not semantic", () => {
    const error = compileError({ id: "test", version: "one" });

    expect(error.message).toBe("Invalid rule set definition: version: must be a semantic version (e.g. 1.0.0)");
  });

  it("rejects duplicate constraint ids across scopes", () => {
    const error = compileError({
      id: "test",
      version: "1.0.0",
      constraints: [{ id: "dup", kind: "unique-items" }],
      scopes: [{ target: "*", constraints: [{ id: "dup", kind: "unique-items" }] }],
    });

    expect(error.message).toBe('Duplicate constraint id "dup".');
  });

  it("rejects malformed target patterns", () => {
    const error = compileError(
      { id: "test", version: "1.0.0", constraints: [{ id: "p", target: "a[1]", kind: "unique-items" }] },
      { ruleSetPath: "rules.yml" },
    );

    expect(error.message).toBe('Invalid path pattern "a[1]": unexpected brackets in "a[1]".');
    expect(error.ruleSetPath).toBe("rules.yml");
  });

  it("resolves custom predicates", () => {
    const ruleSet = compileRuleSet({
      id: "test",
      version: "1.0.0",
      constraints: [{ id: "c", kind: "custom", predicate: "bbox-ordered" }],
    });

    expect(ruleSet.root.constraints[0]).toMatchObject({ kind: "custom", predicate: "bbox-ordered", options: {} });
  });

  it("rejects unknown predicates and lists the known ones", () => {
    const always: Predicate = () => [];
    const error = compileError(
      { id: "test", version: "1.0.0", constraints: [{ id: "c", kind: "custom", predicate: "nope" }] },
      { predicates: new Map([["always", always]]) },
    );

    expect(error.message).toBe('Constraint "c" references unknown predicate "nope". Known predicates: always.');
  });
});
