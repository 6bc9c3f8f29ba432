/**
 * @title Document Node Module
 * @description In-memory tree for a parsed metadata document.
 *
 * A document is a closed set of node variants. Trees are frozen on
 * construction; accessors return `undefined` instead of throwing when a node
 * has a different shape than the caller asked for.
 *
 * @module document
 */

import { FormatError } from "../errors.js";

export interface ObjectNode {
	readonly kind: "object";
	/** Members in insertion order. */
	readonly entries: ReadonlyMap<string, DocumentNode>;
}

export interface ArrayNode {
	readonly kind: "array";
	readonly items: readonly DocumentNode[];
}

export interface StringNode {
	readonly kind: "string";
	readonly value: string;
}

/**
 * Integers and floats share one variant.
 */
export interface NumberNode {
	readonly kind: "number";
	readonly value: number;
}

export interface BooleanNode {
	readonly kind: "boolean";
	readonly value: boolean;
}

export interface NullNode {
	readonly kind: "null";
}

export type DocumentNode = ObjectNode | ArrayNode | StringNode | NumberNode | BooleanNode | NullNode;

/** Discriminant of a document node. */
export type NodeKind = DocumentNode["kind"];

/** Plain JSON value, as produced by `toJson`. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Scalar JSON value. */
export type JsonScalar = string | number | boolean | null;

function frozen<T extends DocumentNode>(node: T): T {
	return Object.freeze(node);
}

const NULL_NODE = frozen<NullNode>({ kind: "null" });

/**
 * Frozen read-only view over an object node's members. Exposes no mutators,
 * so a shared tree cannot be changed through `entries`.
 */
class MemberMap implements ReadonlyMap<string, DocumentNode> {
	private readonly members: Map<string, DocumentNode>;

	constructor(members: Map<string, DocumentNode>) {
		this.members = members;
		Object.freeze(this);
	}

	get size(): number {
		return this.members.size;
	}

	get(key: string): DocumentNode | undefined {
		return this.members.get(key);
	}

	has(key: string): boolean {
		return this.members.has(key);
	}

	forEach(
		callbackfn: (value: DocumentNode, key: string, map: ReadonlyMap<string, DocumentNode>) => void,
		thisArg?: unknown,
	): void {
		for (const [key, value] of this.members) {
			callbackfn.call(thisArg, value, key, this);
		}
	}

	keys() {
		return this.members.keys();
	}

	values() {
		return this.members.values();
	}

	entries() {
		return this.members.entries();
	}

	[Symbol.iterator]() {
		return this.members[Symbol.iterator]();
	}
}

function isPlainObject(value: object): boolean {
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

/**
 * Build a frozen document tree from a plain value.
 *
 * @param value - Value produced by a JSON or YAML parser
 * @returns Root node
 * @throws FormatError if the value contains anything that is not JSON data
 */
export function fromJson(value: unknown): DocumentNode {
	return build(value, new Set<object>(), "$");
}

function build(value: unknown, ancestors: Set<object>, where: string): DocumentNode {
	if (value === null) {
		return NULL_NODE;
	}

	switch (typeof value) {
		case "string":
			return frozen<StringNode>({ kind: "string", value });
		case "boolean":
			return frozen<BooleanNode>({ kind: "boolean", value });
		case "number":
			if (!Number.isFinite(value)) {
				throw new FormatError(`Non-finite number at ${where}.`);
			}
			return frozen<NumberNode>({ kind: "number", value });
		case "object":
			break;
		default:
			throw new FormatError(`Unsupported ${typeof value} value at ${where}.`);
	}

	if (ancestors.has(value)) {
		throw new FormatError(`Circular reference at ${where}.`);
	}

	ancestors.add(value);
	try {
		if (Array.isArray(value)) {
			const items: DocumentNode[] = value.map((item: unknown, index) =>
				build(item, ancestors, `${where}[${index}]`),
			);
			return frozen<ArrayNode>({ kind: "array", items: Object.freeze(items) });
		}

		if (!isPlainObject(value)) {
			throw new FormatError(`Unsupported object value at ${where}.`);
		}

		const entries = new Map<string, DocumentNode>();
		for (const [key, member] of Object.entries(value)) {
			entries.set(key, build(member, ancestors, `${where}.${key}`));
		}
		return frozen<ObjectNode>({ kind: "object", entries: new MemberMap(entries) });
	} finally {
		ancestors.delete(value);
	}
}

/**
 * Convert a document tree back to plain values.
 */
export function toJson(node: DocumentNode): JsonValue {
	switch (node.kind) {
		case "object": {
			const result: { [key: string]: JsonValue } = {};
			for (const [key, member] of node.entries) {
				result[key] = toJson(member);
			}
			return result;
		}
		case "array":
			return node.items.map(toJson);
		case "null":
			return null;
		default:
			return node.value;
	}
}

export function asObject(node: DocumentNode | undefined): ObjectNode | undefined {
	return node?.kind === "object" ? node : undefined;
}

export function asArray(node: DocumentNode | undefined): ArrayNode | undefined {
	return node?.kind === "array" ? node : undefined;
}

export function asString(node: DocumentNode | undefined): string | undefined {
	return node?.kind === "string" ? node.value : undefined;
}

export function asNumber(node: DocumentNode | undefined): number | undefined {
	return node?.kind === "number" ? node.value : undefined;
}

/**
 * Look up an object member. Returns `undefined` for missing keys and for
 * nodes that are not objects.
 */
export function getMember(node: DocumentNode | undefined, key: string): DocumentNode | undefined {
	return asObject(node)?.entries.get(key);
}

/**
 * Look up an array item. Returns `undefined` out of range and for nodes that
 * are not arrays.
 */
export function getItem(node: DocumentNode | undefined, index: number): DocumentNode | undefined {
	return asArray(node)?.items[index];
}

/**
 * Scalar payload of a node, or `undefined` for objects and arrays.
 */
export function scalarValue(node: DocumentNode): JsonScalar | undefined {
	switch (node.kind) {
		case "object":
		case "array":
			return undefined;
		case "null":
			return null;
		default:
			return node.value;
	}
}

/**
 * Render a scalar the way messages quote it: strings in single quotes,
 * everything else as JSON.
 */
export function quoteScalar(value: JsonScalar): string {
	return typeof value === "string" ? `'${value}'` : JSON.stringify(value);
}

/**
 * Short description of a node for diagnostics, e.g. `'WKT'`, `42`,
 * `an array of 3 items`.
 */
export function describeNode(node: DocumentNode): string {
	switch (node.kind) {
		case "object":
			return node.entries.size === 0 ? "an empty object" : "an object";
		case "array":
			return `an array of ${node.items.length} ${node.items.length === 1 ? "item" : "items"}`;
		case "null":
			return "null";
		default:
			return quoteScalar(node.value);
	}
}
