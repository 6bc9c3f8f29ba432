/**
 * @title Rule Set Loading
 * @description Read rule files from disk and provide the bundled rule set.
 *
 * @module rules
 */

import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import { detectFormat, parseText, type DocumentFormat } from "../document/index.js";
import { getErrorMessage, RuleSetError } from "../errors.js";
import { compileRuleSet, type CompileOptions } from "./compile.js";
import type { RuleSet } from "./types.js";

/**
 * Path of the rule file shipped with this package, under `rules/` at the
 * package root. Resolves the same from `src/rules/` and `dist/rules/`.
 */
export const DEFAULT_RULE_SET_PATH = fileURLToPath(new URL("../../rules/geo-metadata.rules.yml", import.meta.url));

/**
 * Parse rule file text (YAML or JSON) and compile it.
 *
 * @param content - Rule file content
 * @param format - Content format (default "yaml"; JSON is valid YAML too)
 * @param options - Compile options
 * @throws RuleSetError if the content cannot be parsed or compiled
 */
export function parseRuleSet(content: string, format: DocumentFormat = "yaml", options: CompileOptions = {}): RuleSet {
	let raw: unknown;
	try {
		raw = parseText(content, format, options.ruleSetPath);
	} catch (error) {
		throw new RuleSetError(`Failed to parse rule set: ${getErrorMessage(error)}`, {
			ruleSetPath: options.ruleSetPath,
			cause: error,
		});
	}
	return compileRuleSet(raw, options);
}

/**
 * Load and compile a rule file.
 *
 * @param ruleSetPath - Path to a .yml, .yaml or .json rule file
 * @param options - Compile options (the path is filled in)
 * @throws RuleSetError if the file cannot be read, parsed or compiled
 */
export function loadRuleSet(ruleSetPath: string, options: Omit<CompileOptions, "ruleSetPath"> = {}): RuleSet {
	let content: string;
	try {
		content = fs.readFileSync(ruleSetPath, "utf-8");
	} catch (error) {
		throw new RuleSetError(`Failed to read rule set file: ${getErrorMessage(error)}`, {
			ruleSetPath,
			cause: error,
		});
	}
	return parseRuleSet(content, detectFormat(ruleSetPath), { ...options, ruleSetPath });
}

let cachedDefault: RuleSet | undefined;

/**
 * The bundled rule set, loaded on first use and shared afterwards.
 */
export function defaultRuleSet(): RuleSet {
	if (!cachedDefault) {
		cachedDefault = loadRuleSet(DEFAULT_RULE_SET_PATH);
	}
	return cachedDefault;
}
