/**
 * @title Rule Set Types
 * @description Declarative constraints evaluated by the validation engine.
 *
 * A rule set is a tree of scopes. Each scope selects nodes with a path
 * pattern relative to its parent scope and lists the constraints checked on
 * every selected node, in declaration order.
 *
 * @module rules
 */

import type { DocumentNode, DocumentPath, JsonScalar, JsonValue } from "../document/index.js";

/**
 * Broad class of a violation.
 */
export type ViolationCategory = "structural" | "type" | "enum" | "cardinality";

/**
 * Value types a `type` constraint can require. `number` accepts integers and
 * floats alike; `integer` only integral numbers.
 */
export type ValueType = "object" | "array" | "string" | "number" | "integer" | "boolean" | "null";

/**
 * One step of a path pattern.
 */
export type PatternSegment =
	| { readonly type: "key"; readonly key: string }
	| { readonly type: "any-key" }
	| { readonly type: "any-index" };

/**
 * Pattern selecting nodes relative to a scope node. The empty pattern selects
 * the scope node itself.
 */
export type PathPattern = readonly PatternSegment[];

interface ConstraintBase {
	/** Unique identifier within the rule set. */
	readonly id: string;
	/** Nodes the constraint applies to, relative to the scope node. */
	readonly target: PathPattern;
	/** Explanation surfaced verbatim with every violation of this constraint. */
	readonly description?: string;
	/** Overrides the default category of the constraint kind. */
	readonly category?: ViolationCategory;
}

/** Properties that must be present on every targeted object. */
export interface RequiredConstraint extends ConstraintBase {
	readonly kind: "required";
	readonly properties: readonly string[];
}

export interface TypeConstraint extends ConstraintBase {
	readonly kind: "type";
	readonly types: readonly ValueType[];
}

/** Exact, case-sensitive membership in a fixed vocabulary. */
export interface EnumConstraint extends ConstraintBase {
	readonly kind: "enum";
	readonly values: readonly JsonScalar[];
}

export interface UniqueItemsConstraint extends ConstraintBase {
	readonly kind: "unique-items";
}

export interface ArrayLengthInConstraint extends ConstraintBase {
	readonly kind: "array-length-in";
	readonly lengths: readonly number[];
}

export interface MinLengthConstraint extends ConstraintBase {
	readonly kind: "min-length";
	readonly min: number;
}

export interface MinPropertiesConstraint extends ConstraintBase {
	readonly kind: "min-properties";
	readonly min: number;
}

/** Minimum length of every key of the targeted objects. */
export interface KeyMinLengthConstraint extends ConstraintBase {
	readonly kind: "key-min-length";
	readonly min: number;
}

/** Cross-field check delegated to a named predicate. */
export interface CustomConstraint extends ConstraintBase {
	readonly kind: "custom";
	readonly predicate: string;
	readonly evaluate: Predicate;
	readonly options: Readonly<Record<string, JsonValue>>;
}

export type Constraint =
	| RequiredConstraint
	| TypeConstraint
	| EnumConstraint
	| UniqueItemsConstraint
	| ArrayLengthInConstraint
	| MinLengthConstraint
	| MinPropertiesConstraint
	| KeyMinLengthConstraint
	| CustomConstraint;

export type ConstraintKind = Constraint["kind"];

/**
 * Group of constraints applied to every node selected by `target`.
 */
export interface RuleScope {
	readonly target: PathPattern;
	readonly description?: string;
	readonly constraints: readonly Constraint[];
	readonly scopes: readonly RuleScope[];
}

/**
 * Immutable, versioned bundle of constraints describing one schema version.
 */
export interface RuleSet {
	readonly id: string;
	readonly title?: string;
	/** Schema version the rule set describes (semantic version). */
	readonly version: string;
	readonly root: RuleScope;
}

/**
 * Context handed to a custom predicate.
 */
export interface PredicateContext {
	/** Root of the document being validated. */
	readonly root: DocumentNode;
	/** Absolute path of the node the predicate is evaluated on. */
	readonly path: DocumentPath;
	/** Options declared with the constraint. */
	readonly options: Readonly<Record<string, JsonValue>>;
}

/**
 * A single problem reported by a predicate.
 */
export interface PredicateFinding {
	message: string;
	/** Absolute path of the offending node; defaults to the evaluated node. */
	path?: DocumentPath;
}

/**
 * Named cross-field check. Returns an empty list when the node passes.
 */
export type Predicate = (node: DocumentNode, context: PredicateContext) => readonly PredicateFinding[];

/** Default category per constraint kind. */
export const DEFAULT_CATEGORIES: Readonly<Record<ConstraintKind, ViolationCategory>> = {
	required: "structural",
	type: "type",
	enum: "enum",
	"unique-items": "cardinality",
	"array-length-in": "cardinality",
	"min-length": "cardinality",
	"min-properties": "cardinality",
	"key-min-length": "cardinality",
	custom: "structural",
};
