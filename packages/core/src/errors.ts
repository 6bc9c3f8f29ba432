/**
 * @title Errors
 * @description Error types for @geoparquet-lint/core.
 *
 * Validation findings are never thrown; these classes cover the failures that
 * happen before a document can be validated at all.
 *
 * @module errors
 */

/**
 * Options for constructing a GeoMetadataError.
 */
export interface GeoMetadataErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all geo metadata errors.
 */
export class GeoMetadataError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: GeoMetadataErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "GeoMetadataError";
		this.code = code;
		this.suggestion = options?.suggestion;

		// Maintain proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * Options for constructing a FormatError.
 */
export interface FormatErrorOptions {
	/** Overrides the default FORMAT_ERROR code. */
	code?: string;
	/** Path of the file the text came from. */
	sourcePath?: string;
	/** Zero-based line reported by the parser. */
	line?: number;
	/** Zero-based column reported by the parser. */
	column?: number;
	cause?: unknown;
}

/**
 * The input could not be turned into a document at all.
 *
 * Distinct from a validation result: a document that fails to parse has no
 * violations, it has no document.
 */
export class FormatError extends GeoMetadataError {
	readonly sourcePath?: string;
	readonly line?: number;
	readonly column?: number;

	constructor(message: string, options?: FormatErrorOptions) {
		super(message, options?.code ?? "FORMAT_ERROR", {
			suggestion: options?.sourcePath ? `Check the document at: ${options.sourcePath}` : undefined,
			cause: options?.cause,
		});
		this.name = "FormatError";
		this.sourcePath = options?.sourcePath;
		this.line = options?.line;
		this.column = options?.column;
	}
}

/**
 * A rule set definition could not be read or compiled.
 */
export class RuleSetError extends GeoMetadataError {
	/** Path to the rule set file. */
	readonly ruleSetPath?: string;

	constructor(message: string, options?: { ruleSetPath?: string; cause?: unknown }) {
		super(message, "RULE_SET_ERROR", {
			suggestion: options?.ruleSetPath ? `Check the rule set file at: ${options.ruleSetPath}` : undefined,
			cause: options?.cause,
		});
		this.name = "RuleSetError";
		this.ruleSetPath = options?.ruleSetPath;
	}
}

/**
 * Check if an error is a GeoMetadataError.
 */
export function isGeoMetadataError(error: unknown): error is GeoMetadataError {
	return error instanceof GeoMetadataError;
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error as a GeoMetadataError.
 */
export function wrapError(error: unknown, context?: string): GeoMetadataError {
	if (isGeoMetadataError(error)) {
		return error;
	}

	const contextPrefix = context ? `${context}: ` : "";

	return new GeoMetadataError(`${contextPrefix}${getErrorMessage(error)}`, "UNKNOWN_ERROR", { cause: error });
}
