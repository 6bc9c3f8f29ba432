/**
 * @geoparquet-lint/core - Validation engine for GeoParquet "geo" metadata.
 *
 * This library provides functionality for:
 * - Document model (frozen JSON tree, paths, JSON/YAML parsing, footer lookup)
 * - Rule sets (declarative constraints, rule file compilation, bundled rules)
 * - Validation (one-pass, ordered violation collection)
 * - Diagnostics (location-tagged, human-readable messages)
 */

// Error exports
export {
	GeoMetadataError,
	FormatError,
	RuleSetError,
	type GeoMetadataErrorOptions,
	type FormatErrorOptions,
	isGeoMetadataError,
	getErrorMessage,
	wrapError,
} from "./errors.js";

// Document exports
export * from "./document/index.js";

// Rule set exports
export * from "./rules/index.js";

// Validation exports
export * from "./validation/index.js";

// Diagnostics exports
export * from "./diagnostics/index.js";
