/**
 * geoparquet-lint conformance: check a rule set against the fixture catalog.
 */

import chalk from "chalk";
import { Command } from "commander";
import { runConformance, serializeFixture, type ConformanceOutcome } from "@geoparquet-lint/conformance";
import { formatDiagnostics, renderViolations, type RuleSet } from "@geoparquet-lint/core";
import type { CliOptions } from "../config.js";
import { EXIT_OK, EXIT_VIOLATIONS, prepare, reportFatal, stdoutWriter, type Writer } from "./shared.js";

export type ConformanceOptions = CliOptions;

/**
 * Failure block: the header, the unexpected diagnostics of a valid fixture,
 * then the fixture document as `fixtures` writes it.
 */
function describeFailure(outcome: ConformanceOutcome): string {
	const { expectation, name } = outcome.fixture;
	const lines: string[] = [];
	if (expectation === "valid") {
		lines.push(`${chalk.red("FAIL")} ${expectation}/${name}: expected no violations`);
		lines.push(...formatDiagnostics(renderViolations(outcome.violations)).split("\n"));
	} else {
		lines.push(`${chalk.red("FAIL")} ${expectation}/${name}: expected at least one violation`);
	}
	lines.push(...serializeFixture(outcome.fixture).trimEnd().split("\n"));
	return lines.join("\n  ");
}

/**
 * Run the conformance command.
 *
 * @returns Process exit code
 */
export function runConformanceCommand(
	options: ConformanceOptions,
	io: { write?: Writer; env?: NodeJS.ProcessEnv } = {},
): number {
	const write = io.write ?? stdoutWriter;

	let ruleSet: RuleSet;
	try {
		ruleSet = prepare(options, io.env).ruleSet;
	} catch (error) {
		return reportFatal(error);
	}

	const report = runConformance(ruleSet);
	for (const failure of report.failures) {
		write(describeFailure(failure));
	}

	const total = report.outcomes.length;
	const passed = total - report.failures.length;
	write(`${report.ruleSetId} ${report.ruleSetVersion}: ${passed}/${total} fixtures passed`);
	return report.passed ? EXIT_OK : EXIT_VIOLATIONS;
}

export const conformanceCommand = new Command("conformance")
	.description("Check a rule set against the built-in fixture catalog")
	.option("-r, --rules <path>", "Rule set file (default: bundled rule set)")
	.action((_options: ConformanceOptions, command: Command) => {
		process.exitCode = runConformanceCommand(command.optsWithGlobals<ConformanceOptions>());
	});
