/**
 * @title Document Paths
 * @description Location of a node inside a document, and its display form.
 *
 * @module document
 */

/** One step from a node to a child: an object key or an array index. */
export type PathSegment = string | number;

/** Steps from the document root to a node. */
export type DocumentPath = readonly PathSegment[];

/** Display form of the root path. */
export const ROOT_PATH_LABEL = "$";

const IDENTIFIER_KEY = /^[^\s.[\]"]+$/;

/**
 * Render a path as `columns.geometry.bbox[2]`.
 *
 * Keys that would not read back unambiguously (empty, or containing dots,
 * brackets, quotes or whitespace) are rendered as `["..."]`.
 */
export function formatPath(path: DocumentPath): string {
	if (path.length === 0) {
		return ROOT_PATH_LABEL;
	}

	let result = "";
	for (const segment of path) {
		if (typeof segment === "number") {
			result += `[${segment}]`;
		} else if (IDENTIFIER_KEY.test(segment)) {
			result += result === "" ? segment : `.${segment}`;
		} else {
			result += `[${JSON.stringify(segment)}]`;
		}
	}
	return result;
}

/**
 * Append a segment without mutating the parent path.
 */
export function childPath(parent: DocumentPath, segment: PathSegment): DocumentPath {
	return [...parent, segment];
}
