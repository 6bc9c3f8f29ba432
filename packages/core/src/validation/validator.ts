/**
 * @title Metadata Validator
 * @description A rule set bound to the validation entry points.
 *
 * @module validation
 */

import { parseDocument, type DocumentFormat, type DocumentNode } from "../document/index.js";
import { defaultRuleSet, type RuleSet } from "../rules/index.js";
import { isValid, validate, validateValue } from "./engine.js";
import type { Violation } from "./types.js";

/**
 * Validates metadata documents against one fixed rule set.
 *
 * Holds no state besides the (frozen) rule set, so one instance can serve any
 * number of documents.
 *
 * @example
 * ```typescript
 * const validator = new MetadataValidator();
 * const violations = validator.validateText(footer["geo"]);
 * ```
 */
export class MetadataValidator {
	readonly ruleSet: RuleSet;

	constructor(ruleSet: RuleSet = defaultRuleSet()) {
		this.ruleSet = ruleSet;
	}

	validate(document: DocumentNode): Violation[] {
		return validate(document, this.ruleSet);
	}

	/**
	 * @throws FormatError if the value is not JSON data
	 */
	validateValue(value: unknown): Violation[] {
		return validateValue(value, this.ruleSet);
	}

	/**
	 * Parse and validate metadata text.
	 *
	 * @throws FormatError if the text cannot be parsed
	 */
	validateText(content: string, format: DocumentFormat = "json", sourcePath?: string): Violation[] {
		return validate(parseDocument(content, format, sourcePath), this.ruleSet);
	}

	isValid(document: DocumentNode): boolean {
		return isValid(this.validate(document));
	}
}
