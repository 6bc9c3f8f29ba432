/**
 * @title Diagnostics Reporter
 * @description Turn raw violations into location-tagged, human-readable
 * diagnostics.
 *
 * @module diagnostics
 */

import { describeNode, formatPath, type JsonScalar } from "../document/index.js";
import type { ViolationCategory } from "../rules/index.js";
import type { Violation } from "../validation/index.js";

/**
 * A rendered violation.
 */
export interface Diagnostic {
	/** Dotted/bracketed location, e.g. `columns.geometry.bbox[2]`. */
	path: string;
	/** What failed, with what was expected and what was found. */
	message: string;
	/** Rule-provided explanation, verbatim. */
	description?: string;
	/** Id of the failing constraint. */
	ruleId: string;
	category: ViolationCategory;
}

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
	return `${count} ${count === 1 ? singular : pluralForm}`;
}

function alternatives(values: readonly string[]): string {
	if (values.length <= 1) {
		return values.join("");
	}
	return `${values.slice(0, -1).join(", ")} or ${values[values.length - 1]}`;
}

function vocabulary(values: readonly JsonScalar[]): string {
	return `[${values.map((value) => (typeof value === "string" ? value : JSON.stringify(value))).join(", ")}]`;
}

/**
 * Short English message for a violation, e.g.
 * `expected one of [WKB], found 'WKT'`.
 */
export function violationMessage(violation: Violation): string {
	switch (violation.kind) {
		case "root-type":
			return `expected object, found ${describeNode(violation.found)}`;
		case "required":
			return `missing required property '${violation.property}'`;
		case "type":
			return `expected ${alternatives(violation.expected)}, found ${describeNode(violation.found)}`;
		case "enum":
			return `expected one of ${vocabulary(violation.allowed)}, found ${describeNode(violation.found)}`;
		case "unique-items":
			return (
				`expected unique items, found duplicate ${describeNode(violation.duplicate)} ` +
				`at index ${violation.index} (first seen at index ${violation.firstIndex})`
			);
		case "array-length-in":
			return `expected ${alternatives(violation.allowed.map(String))} items, found ${violation.length}`;
		case "min-length":
			return `expected at least ${plural(violation.min, "character")}, found '${violation.found}'`;
		case "min-properties":
			return `expected at least ${plural(violation.min, "entry", "entries")}, found ${violation.count}`;
		case "key-min-length":
			return `expected keys of at least ${plural(violation.min, "character")}, found '${violation.key}'`;
		case "custom":
			return violation.message;
	}
}

/**
 * Render one violation.
 */
export function renderViolation(violation: Violation): Diagnostic {
	const diagnostic: Diagnostic = {
		path: formatPath(violation.path),
		message: violationMessage(violation),
		ruleId: violation.ruleId,
		category: violation.category,
	};
	if (violation.description !== undefined) {
		diagnostic.description = violation.description;
	}
	return diagnostic;
}

/**
 * Render every violation, keeping their order.
 */
export function renderViolations(violations: readonly Violation[]): Diagnostic[] {
	return violations.map(renderViolation);
}

/**
 * Format a diagnostic as one line: `- <path>: <message>. <description>`.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
	let line = `- ${diagnostic.path}: ${diagnostic.message}`;
	if (diagnostic.description) {
		line += `. ${diagnostic.description}`;
	}
	return line;
}

/**
 * Format diagnostics for display, with a summary line.
 */
export function formatDiagnostics(diagnostics: readonly Diagnostic[]): string {
	if (diagnostics.length === 0) {
		return "No violations found.";
	}

	const lines = [`Found ${plural(diagnostics.length, "violation")}:`];
	for (const diagnostic of diagnostics) {
		lines.push(formatDiagnostic(diagnostic));
	}
	return lines.join("\n");
}
