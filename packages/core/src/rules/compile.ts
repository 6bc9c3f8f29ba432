/**
 * @title Rule Set Compiler
 * @description Check a raw rule file against its schema and turn it into an
 * immutable RuleSet.
 *
 * @module rules
 */

import * as semver from "semver";
import { z } from "zod";
import type { JsonValue } from "../document/index.js";
import { RuleSetError } from "../errors.js";
import { parsePathPattern } from "./pattern.js";
import { BUILTIN_PREDICATES } from "./predicates.js";
import type { Constraint, Predicate, RuleScope, RuleSet, ValueType } from "./types.js";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
	z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

const valueTypeSchema = z.enum(["object", "array", "string", "number", "integer", "boolean", "null"]);

const categorySchema = z.enum(["structural", "type", "enum", "cardinality"]);

const countSchema = z.number().int().nonnegative();

const base = {
	id: z.string().min(1),
	target: z.string().optional(),
	description: z.string().optional(),
	category: categorySchema.optional(),
};

const rawConstraintSchema = z.discriminatedUnion("kind", [
	z.object({ ...base, kind: z.literal("required"), properties: z.array(z.string()).min(1) }),
	z.object({ ...base, kind: z.literal("type"), type: z.union([valueTypeSchema, z.array(valueTypeSchema).min(1)]) }),
	z.object({
		...base,
		kind: z.literal("enum"),
		values: z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])).min(1),
	}),
	z.object({ ...base, kind: z.literal("unique-items") }),
	z.object({ ...base, kind: z.literal("array-length-in"), lengths: z.array(countSchema).min(1) }),
	z.object({ ...base, kind: z.literal("min-length"), min: countSchema }),
	z.object({ ...base, kind: z.literal("min-properties"), min: countSchema }),
	z.object({ ...base, kind: z.literal("key-min-length"), min: countSchema }),
	z.object({
		...base,
		kind: z.literal("custom"),
		predicate: z.string().min(1),
		options: z.record(jsonValueSchema).optional(),
	}),
]);

/** A constraint as written in a rule file. */
export type RawConstraint = z.infer<typeof rawConstraintSchema>;

/** A scope as written in a rule file. */
export interface RawScope {
	target?: string;
	description?: string;
	constraints?: RawConstraint[];
	scopes?: RawScope[];
}

const rawScopeSchema: z.ZodType<RawScope> = z.lazy(() =>
	z.object({
		target: z.string().optional(),
		description: z.string().optional(),
		constraints: z.array(rawConstraintSchema).optional(),
		scopes: z.array(rawScopeSchema).optional(),
	}),
);

const rawRuleSetSchema = z.object({
	id: z.string().min(1),
	title: z.string().optional(),
	version: z.string().refine((value) => semver.valid(value) !== null, {
		message: "must be a semantic version (e.g. 1.0.0)",
	}),
	constraints: z.array(rawConstraintSchema).optional(),
	scopes: z.array(rawScopeSchema).optional(),
});

/** A rule file after schema checks, before compilation. */
export type RawRuleSet = z.infer<typeof rawRuleSetSchema>;

/**
 * Options for compiling a rule set.
 */
export interface CompileOptions {
	/** Predicates `custom` constraints may reference (default: built-ins). */
	predicates?: ReadonlyMap<string, Predicate>;
	/** Source path for error messages. */
	ruleSetPath?: string;
}

/**
 * Compile a parsed rule file into a frozen RuleSet.
 *
 * @param raw - Parsed rule file (plain object)
 * @param options - Compile options
 * @returns Compiled rule set
 * @throws RuleSetError if the file does not describe a valid rule set
 */
export function compileRuleSet(raw: unknown, options: CompileOptions = {}): RuleSet {
	const { predicates = BUILTIN_PREDICATES, ruleSetPath } = options;

	const parsed = rawRuleSetSchema.safeParse(raw);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
			.join("; ");
		throw new RuleSetError(`Invalid rule set definition: ${details}`, { ruleSetPath });
	}

	const seenIds = new Set<string>();
	const compiler = { predicates, ruleSetPath, seenIds };
	const definition = parsed.data;

	const root = compileScope(
		{ target: "", constraints: definition.constraints, scopes: definition.scopes },
		compiler,
	);

	return deepFreeze({
		id: definition.id,
		title: definition.title,
		version: definition.version,
		root,
	});
}

interface CompilerState {
	predicates: ReadonlyMap<string, Predicate>;
	ruleSetPath?: string;
	seenIds: Set<string>;
}

function compileScope(raw: RawScope, state: CompilerState): RuleScope {
	return {
		target: compilePattern(raw.target ?? "", state),
		description: raw.description,
		constraints: (raw.constraints ?? []).map((constraint) => compileConstraint(constraint, state)),
		scopes: (raw.scopes ?? []).map((scope) => compileScope(scope, state)),
	};
}

function compilePattern(text: string, state: CompilerState) {
	try {
		return parsePathPattern(text);
	} catch (error) {
		throw new RuleSetError(error instanceof Error ? error.message : String(error), {
			ruleSetPath: state.ruleSetPath,
			cause: error,
		});
	}
}

function compileConstraint(raw: RawConstraint, state: CompilerState): Constraint {
	if (state.seenIds.has(raw.id)) {
		throw new RuleSetError(`Duplicate constraint id "${raw.id}".`, { ruleSetPath: state.ruleSetPath });
	}
	state.seenIds.add(raw.id);

	const common = {
		id: raw.id,
		target: compilePattern(raw.target ?? "", state),
		description: raw.description,
		category: raw.category,
	};

	switch (raw.kind) {
		case "required":
			return { ...common, kind: "required", properties: raw.properties };
		case "type": {
			const types: ValueType[] = Array.isArray(raw.type) ? raw.type : [raw.type];
			return { ...common, kind: "type", types };
		}
		case "enum":
			return { ...common, kind: "enum", values: raw.values };
		case "unique-items":
			return { ...common, kind: "unique-items" };
		case "array-length-in":
			return { ...common, kind: "array-length-in", lengths: raw.lengths };
		case "min-length":
			return { ...common, kind: "min-length", min: raw.min };
		case "min-properties":
			return { ...common, kind: "min-properties", min: raw.min };
		case "key-min-length":
			return { ...common, kind: "key-min-length", min: raw.min };
		case "custom": {
			const evaluate = state.predicates.get(raw.predicate);
			if (!evaluate) {
				const known = [...state.predicates.keys()].join(", ");
				throw new RuleSetError(
					`Constraint "${raw.id}" references unknown predicate "${raw.predicate}". Known predicates: ${known}.`,
					{ ruleSetPath: state.ruleSetPath },
				);
			}
			return { ...common, kind: "custom", predicate: raw.predicate, evaluate, options: raw.options ?? {} };
		}
	}
}

function deepFreeze<T>(value: T): T {
	if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const member of Object.values(value)) {
			deepFreeze(member);
		}
	}
	return value;
}
