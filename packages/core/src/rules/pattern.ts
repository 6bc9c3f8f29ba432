/**
 * @title Path Patterns
 * @description Parse and resolve the target patterns used by constraints.
 *
 * Syntax: dotted keys, `*` for every key of an object and `[*]` for every
 * item of an array, e.g. `columns.*.geometry_types[*]`. The empty string is
 * the scope node itself.
 *
 * @module rules
 */

import { childPath, type DocumentNode, type DocumentPath } from "../document/index.js";
import type { PathPattern, PatternSegment } from "./types.js";

const PART = /^([^[\]]*)((?:\[\*\])*)$/;

/**
 * Parse a pattern string.
 *
 * @param text - Pattern text
 * @returns Parsed pattern
 * @throws Error describing the malformed part
 */
export function parsePathPattern(text: string): PathPattern {
	if (text === "") {
		return [];
	}

	const segments: PatternSegment[] = [];
	for (const part of text.split(".")) {
		const match = PART.exec(part);
		if (!match) {
			throw new Error(`Invalid path pattern "${text}": unexpected brackets in "${part}".`);
		}
		const [, name, brackets] = match;
		if (name === "" && (brackets === "" || segments.length > 0)) {
			throw new Error(`Invalid path pattern "${text}": empty key.`);
		}
		if (name === "*") {
			segments.push({ type: "any-key" });
		} else if (name !== "") {
			segments.push({ type: "key", key: name });
		}
		for (let i = 0; i < brackets.length / 3; i++) {
			segments.push({ type: "any-index" });
		}
	}
	return segments;
}

/**
 * Render a pattern back to its text form.
 */
export function formatPathPattern(pattern: PathPattern): string {
	let result = "";
	for (const segment of pattern) {
		switch (segment.type) {
			case "any-index":
				result += "[*]";
				break;
			case "any-key":
				result += result === "" ? "*" : ".*";
				break;
			case "key":
				result += result === "" ? segment.key : `.${segment.key}`;
				break;
		}
	}
	return result;
}

/**
 * A node selected by a pattern, with its absolute path.
 */
export interface PatternMatch {
	node: DocumentNode;
	path: DocumentPath;
}

/**
 * Select the nodes a pattern reaches from a base node, in document order.
 *
 * Missing keys and nodes of the wrong shape simply select nothing: a pattern
 * never descends into a scalar.
 */
export function resolvePattern(base: DocumentNode, basePath: DocumentPath, pattern: PathPattern): PatternMatch[] {
	let current: PatternMatch[] = [{ node: base, path: basePath }];

	for (const segment of pattern) {
		const next: PatternMatch[] = [];
		for (const { node, path } of current) {
			switch (segment.type) {
				case "key": {
					if (node.kind !== "object") {
						break;
					}
					const member = node.entries.get(segment.key);
					if (member !== undefined) {
						next.push({ node: member, path: childPath(path, segment.key) });
					}
					break;
				}
				case "any-key":
					if (node.kind === "object") {
						for (const [key, member] of node.entries) {
							next.push({ node: member, path: childPath(path, key) });
						}
					}
					break;
				case "any-index":
					if (node.kind === "array") {
						node.items.forEach((item, index) => next.push({ node: item, path: childPath(path, index) }));
					}
					break;
			}
		}
		current = next;
	}

	return current;
}
