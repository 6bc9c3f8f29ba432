/**
 * geoparquet-lint rules: list the constraints of a rule set.
 */

import chalk from "chalk";
import { Command } from "commander";
import {
	formatPathPattern,
	type Constraint,
	type PathPattern,
	type RuleScope,
	type RuleSet,
} from "@geoparquet-lint/core";
import type { CliOptions } from "../config.js";
import { EXIT_OK, prepare, reportFatal, stdoutWriter, type Writer } from "./shared.js";

export type RulesOptions = CliOptions & {
	json?: boolean;
};

/**
 * One constraint with its pattern resolved from the document root.
 */
export interface RuleEntry {
	id: string;
	kind: Constraint["kind"];
	/** Absolute target pattern; `$` for the document root. */
	target: string;
	summary: string;
	description?: string;
}

/**
 * Short, kind-specific summary of what a constraint checks.
 */
export function summarizeConstraint(constraint: Constraint): string {
	switch (constraint.kind) {
		case "required":
			return `required: ${constraint.properties.join(", ")}`;
		case "type":
			return `type: ${constraint.types.join(" | ")}`;
		case "enum":
			return `one of: ${constraint.values.map((value) => String(value)).join(", ")}`;
		case "unique-items":
			return "unique items";
		case "array-length-in":
			return `length in: ${constraint.lengths.join(", ")}`;
		case "min-length":
			return `min length: ${constraint.min}`;
		case "min-properties":
			return `min entries: ${constraint.min}`;
		case "key-min-length":
			return `min key length: ${constraint.min}`;
		case "custom":
			return `predicate: ${constraint.predicate}`;
	}
}

/**
 * Flatten a rule set into its constraints, in evaluation order.
 */
export function listRules(ruleSet: RuleSet): RuleEntry[] {
	const entries: RuleEntry[] = [];

	const visit = (scope: RuleScope, base: PathPattern): void => {
		const scopePattern = [...base, ...scope.target];
		for (const constraint of scope.constraints) {
			const target = formatPathPattern([...scopePattern, ...constraint.target]);
			const entry: RuleEntry = {
				id: constraint.id,
				kind: constraint.kind,
				target: target === "" ? "$" : target,
				summary: summarizeConstraint(constraint),
			};
			if (constraint.description !== undefined) {
				entry.description = constraint.description;
			}
			entries.push(entry);
		}
		for (const child of scope.scopes) {
			visit(child, scopePattern);
		}
	};

	visit(ruleSet.root, []);
	return entries;
}

/**
 * Run the rules command.
 *
 * @returns Process exit code
 */
export function runRules(options: RulesOptions, io: { write?: Writer; env?: NodeJS.ProcessEnv } = {}): number {
	const write = io.write ?? stdoutWriter;

	let ruleSet: RuleSet;
	try {
		ruleSet = prepare(options, io.env).ruleSet;
	} catch (error) {
		return reportFatal(error);
	}

	const entries = listRules(ruleSet);
	if (options.json) {
		write(JSON.stringify({ id: ruleSet.id, version: ruleSet.version, rules: entries }, null, 2));
		return EXIT_OK;
	}

	write(chalk.bold(`${ruleSet.title ?? ruleSet.id} (${ruleSet.version})`));
	for (const entry of entries) {
		write(`  ${entry.target}  ${entry.summary}  ${chalk.dim(`[${entry.id}]`)}`);
	}
	return EXIT_OK;
}

export const rulesCommand = new Command("rules")
	.description("List the constraints of a rule set")
	.option("-r, --rules <path>", "Rule set file (default: bundled rule set)")
	.option("--json", "Output as JSON")
	.action((_options: RulesOptions, command: Command) => {
		process.exitCode = runRules(command.optsWithGlobals<RulesOptions>());
	});
