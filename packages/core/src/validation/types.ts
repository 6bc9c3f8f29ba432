/**
 * @title Violation Types
 * @description Raw constraint failures produced by the validation engine.
 *
 * Violations carry the data needed to explain the failure; turning them into
 * text is the diagnostics module's job.
 *
 * @module validation
 */

import type { DocumentNode, DocumentPath, JsonScalar } from "../document/index.js";
import type { ValueType, ViolationCategory } from "../rules/index.js";

interface ViolationBase {
	/** Id of the failing constraint (`root-type` for a non-object root). */
	ruleId: string;
	category: ViolationCategory;
	/** Location of the offending node. */
	path: DocumentPath;
	/** Explanation from the rule set, if it supplies one. */
	description?: string;
}

/** The document root is not an object. */
export interface RootTypeViolation extends ViolationBase {
	kind: "root-type";
	found: DocumentNode;
}

/** `path` is the missing property's own location. */
export interface RequiredViolation extends ViolationBase {
	kind: "required";
	property: string;
}

export interface TypeViolation extends ViolationBase {
	kind: "type";
	expected: readonly ValueType[];
	found: DocumentNode;
}

export interface EnumViolation extends ViolationBase {
	kind: "enum";
	allowed: readonly JsonScalar[];
	found: DocumentNode;
}

/** Cites the first item (by index) equal to an earlier one. */
export interface UniqueItemsViolation extends ViolationBase {
	kind: "unique-items";
	duplicate: DocumentNode;
	index: number;
	firstIndex: number;
}

export interface ArrayLengthViolation extends ViolationBase {
	kind: "array-length-in";
	allowed: readonly number[];
	length: number;
}

export interface MinLengthViolation extends ViolationBase {
	kind: "min-length";
	min: number;
	found: string;
}

export interface MinPropertiesViolation extends ViolationBase {
	kind: "min-properties";
	min: number;
	count: number;
}

/** `path` is the offending key's own location. */
export interface KeyMinLengthViolation extends ViolationBase {
	kind: "key-min-length";
	min: number;
	key: string;
}

export interface CustomViolation extends ViolationBase {
	kind: "custom";
	predicate: string;
	message: string;
}

export type Violation =
	| RootTypeViolation
	| RequiredViolation
	| TypeViolation
	| EnumViolation
	| UniqueItemsViolation
	| ArrayLengthViolation
	| MinLengthViolation
	| MinPropertiesViolation
	| KeyMinLengthViolation
	| CustomViolation;

export type ViolationKind = Violation["kind"];
