/**
 * @title Document Parsing Module
 * @description Turn metadata text into a document tree.
 *
 * Handles JSON and YAML text, and the `geo` entry of a Parquet footer's
 * key/value metadata. Anything that cannot be parsed raises FormatError.
 *
 * @module document
 */

import * as yaml from "js-yaml";
import { FormatError, getErrorMessage } from "../errors.js";
import { fromJson, type DocumentNode } from "./node.js";

/** Text formats a document can be read from. */
export type DocumentFormat = "json" | "yaml";

/** Footer key under which GeoParquet stores its metadata. */
export const GEO_METADATA_KEY = "geo";

/**
 * Detect the document format from a file path based on its extension.
 */
export function detectFormat(filePath: string): DocumentFormat {
	return /\.ya?ml$/i.test(filePath) ? "yaml" : "json";
}

const BYTE_ORDER_MARK = "\uFEFF";

/**
 * Parse document text into a plain value.
 *
 * @param content - Raw text
 * @param format - Text format
 * @param sourcePath - Source path for error messages (optional)
 * @throws FormatError if the text is empty or not well-formed
 */
export function parseText(content: string, format: DocumentFormat, sourcePath?: string): unknown {
	// A leading byte order mark is not part of the document.
	const text = content.startsWith(BYTE_ORDER_MARK) ? content.slice(BYTE_ORDER_MARK.length) : content;
	if (text.trim() === "") {
		throw new FormatError("Document is empty.", { sourcePath });
	}

	try {
		// JSON_SCHEMA keeps YAML scalars to the JSON types (no dates, no octals).
		return format === "json" ? JSON.parse(text) : yaml.load(text, { schema: yaml.JSON_SCHEMA });
	} catch (err: unknown) {
		if (err instanceof yaml.YAMLException) {
			throw new FormatError(`Invalid YAML: ${err.reason ?? err.message}`, {
				sourcePath,
				line: err.mark?.line,
				column: err.mark?.column,
				cause: err,
			});
		}
		throw new FormatError(`Invalid JSON: ${getErrorMessage(err)}`, { sourcePath, cause: err });
	}
}

/**
 * Parse document text into a document tree.
 *
 * @param content - Raw text
 * @param format - Text format (default "json")
 * @param sourcePath - Source path for error messages (optional)
 * @returns Root node
 * @throws FormatError if the text cannot be parsed
 */
export function parseDocument(content: string, format: DocumentFormat = "json", sourcePath?: string): DocumentNode {
	const parsed = parseText(content, format, sourcePath);
	try {
		return fromJson(parsed);
	} catch (err) {
		if (err instanceof FormatError && sourcePath) {
			throw new FormatError(err.message, { sourcePath, cause: err });
		}
		throw err;
	}
}

/**
 * Read the geo metadata document out of a Parquet footer's key/value
 * metadata.
 *
 * @param keyValueMetadata - Footer entries, as decoded by a Parquet reader
 * @param key - Footer key holding the JSON text
 * @returns Root node of the metadata document
 * @throws FormatError if the key is missing or its value is not valid JSON
 */
export function readGeoMetadata(keyValueMetadata: FooterMetadata, key: string = GEO_METADATA_KEY): DocumentNode {
	const text = lookupFooterEntry(keyValueMetadata, key);

	if (text === undefined) {
		throw new FormatError(`Footer metadata has no "${key}" entry.`, {
			code: "MISSING_METADATA_KEY",
		});
	}

	return parseDocument(text, "json");
}

/** Footer key/value metadata as a map or a plain record. */
export type FooterMetadata = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

function isFooterMap(metadata: FooterMetadata): metadata is ReadonlyMap<string, string> {
	return metadata instanceof Map;
}

function lookupFooterEntry(metadata: FooterMetadata, key: string): string | undefined {
	if (isFooterMap(metadata)) {
		return metadata.get(key);
	}
	return Object.prototype.hasOwnProperty.call(metadata, key) ? metadata[key] : undefined;
}
