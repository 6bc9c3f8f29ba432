/**
 * @title Validation Engine
 * @description Evaluate a rule set against a document tree.
 *
 * Every violation in the document is collected in one pass; no check stops
 * its siblings. Order is deterministic: a scope's constraints in declaration
 * order, then its child scopes, once per selected node in document order.
 *
 * @module validation
 */

import { childPath, fromJson, scalarValue, type DocumentNode, type DocumentPath } from "../document/index.js";
import {
	DEFAULT_CATEGORIES,
	resolvePattern,
	type Constraint,
	type RuleScope,
	type RuleSet,
	type ValueType,
} from "../rules/index.js";
import type { Violation } from "./types.js";

/**
 * Validate a document against a rule set.
 *
 * Never throws for malformed documents. A root that is not an object yields a
 * single `root-type` violation.
 *
 * @param document - Root of the document
 * @param ruleSet - Rule set to evaluate
 * @returns Violations in deterministic order; empty when the document is valid
 */
export function validate(document: DocumentNode, ruleSet: RuleSet): Violation[] {
	if (document.kind !== "object") {
		return [{ kind: "root-type", ruleId: "root-type", category: "structural", path: [], found: document }];
	}

	const violations: Violation[] = [];
	evaluateScope(ruleSet.root, document, [], document, violations);
	return violations;
}

/**
 * Validate a plain value (e.g. the output of `JSON.parse`).
 *
 * @throws FormatError if the value is not JSON data
 */
export function validateValue(value: unknown, ruleSet: RuleSet): Violation[] {
	return validate(fromJson(value), ruleSet);
}

/**
 * Whether a violation list describes a valid document.
 */
export function isValid(violations: readonly Violation[]): boolean {
	return violations.length === 0;
}

function evaluateScope(
	scope: RuleScope,
	base: DocumentNode,
	basePath: DocumentPath,
	root: DocumentNode,
	violations: Violation[],
): void {
	for (const match of resolvePattern(base, basePath, scope.target)) {
		for (const constraint of scope.constraints) {
			for (const target of resolvePattern(match.node, match.path, constraint.target)) {
				evaluateConstraint(constraint, target.node, target.path, root, violations);
			}
		}
		for (const child of scope.scopes) {
			evaluateScope(child, match.node, match.path, root, violations);
		}
	}
}

function evaluateConstraint(
	constraint: Constraint,
	node: DocumentNode,
	path: DocumentPath,
	root: DocumentNode,
	violations: Violation[],
): void {
	const common = {
		ruleId: constraint.id,
		category: constraint.category ?? DEFAULT_CATEGORIES[constraint.kind],
		description: constraint.description,
	};

	switch (constraint.kind) {
		case "required": {
			if (node.kind !== "object") {
				return;
			}
			for (const property of constraint.properties) {
				if (!node.entries.has(property)) {
					violations.push({ ...common, kind: "required", path: childPath(path, property), property });
				}
			}
			return;
		}

		case "type": {
			if (!constraint.types.some((type) => matchesType(node, type))) {
				violations.push({ ...common, kind: "type", path, expected: constraint.types, found: node });
			}
			return;
		}

		case "enum": {
			const value = scalarValue(node);
			if (value === undefined || !constraint.values.includes(value)) {
				violations.push({ ...common, kind: "enum", path, allowed: constraint.values, found: node });
			}
			return;
		}

		case "unique-items": {
			if (node.kind !== "array") {
				return;
			}
			const duplicate = findFirstDuplicate(node.items);
			if (duplicate) {
				violations.push({
					...common,
					kind: "unique-items",
					path,
					duplicate: node.items[duplicate.index],
					index: duplicate.index,
					firstIndex: duplicate.firstIndex,
				});
			}
			return;
		}

		case "array-length-in": {
			if (node.kind === "array" && !constraint.lengths.includes(node.items.length)) {
				violations.push({
					...common,
					kind: "array-length-in",
					path,
					allowed: constraint.lengths,
					length: node.items.length,
				});
			}
			return;
		}

		case "min-length": {
			if (node.kind === "string" && [...node.value].length < constraint.min) {
				violations.push({ ...common, kind: "min-length", path, min: constraint.min, found: node.value });
			}
			return;
		}

		case "min-properties": {
			if (node.kind === "object" && node.entries.size < constraint.min) {
				violations.push({
					...common,
					kind: "min-properties",
					path,
					min: constraint.min,
					count: node.entries.size,
				});
			}
			return;
		}

		case "key-min-length": {
			if (node.kind !== "object") {
				return;
			}
			for (const key of node.entries.keys()) {
				if ([...key].length < constraint.min) {
					violations.push({
						...common,
						kind: "key-min-length",
						path: childPath(path, key),
						min: constraint.min,
						key,
					});
				}
			}
			return;
		}

		case "custom": {
			const findings = constraint.evaluate(node, { root, path, options: constraint.options });
			for (const finding of findings) {
				violations.push({
					...common,
					kind: "custom",
					path: finding.path ?? path,
					predicate: constraint.predicate,
					message: finding.message,
				});
			}
			return;
		}
	}
}

function matchesType(node: DocumentNode, type: ValueType): boolean {
	if (type === "integer") {
		return node.kind === "number" && Number.isInteger(node.value);
	}
	return node.kind === type;
}

function findFirstDuplicate(items: readonly DocumentNode[]): { index: number; firstIndex: number } | undefined {
	for (let index = 1; index < items.length; index++) {
		for (let earlier = 0; earlier < index; earlier++) {
			if (nodesEqual(items[earlier], items[index])) {
				return { index, firstIndex: earlier };
			}
		}
	}
	return undefined;
}

/**
 * Exact value equality; objects compare by members regardless of key order.
 */
export function nodesEqual(a: DocumentNode, b: DocumentNode): boolean {
	if (a.kind === "object" && b.kind === "object") {
		if (a.entries.size !== b.entries.size) {
			return false;
		}
		for (const [key, member] of a.entries) {
			const other = b.entries.get(key);
			if (other === undefined || !nodesEqual(member, other)) {
				return false;
			}
		}
		return true;
	}
	if (a.kind === "array" && b.kind === "array") {
		return a.items.length === b.items.length && a.items.every((item, index) => nodesEqual(item, b.items[index]));
	}
	return a.kind === b.kind && scalarValue(a) === scalarValue(b);
}
