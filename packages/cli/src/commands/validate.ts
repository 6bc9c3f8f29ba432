/**
 * geoparquet-lint validate: check metadata documents against a rule set.
 *
 *   geoparquet-lint validate metadata.json
 *   geoparquet-lint validate --key geo "fixtures/*.json"
 */

import * as fs from "node:fs";
import chalk from "chalk";
import { Command } from "commander";
import { glob, hasMagic } from "glob";
import {
	asString,
	detectFormat,
	formatDiagnostic,
	FormatError,
	GeoMetadataError,
	getErrorMessage,
	getMember,
	isVersionCompatible,
	parseDocument,
	renderViolations,
	validate,
	wrapError,
	type Diagnostic,
	type DocumentFormat,
	type RuleSet,
	type Violation,
} from "@geoparquet-lint/core";
import type { CliOptions } from "../config.js";
import { logMessage } from "../utils/log.js";
import { EXIT_ERROR, EXIT_OK, EXIT_VIOLATIONS, prepare, reportFatal, stdoutWriter, type Writer } from "./shared.js";

export type ValidateOptions = CliOptions & {
	format?: string;
	json?: boolean;
};

/**
 * Result of validating one file.
 */
export type FileReport =
	| { file: string; violations: Violation[]; diagnostics: Diagnostic[] }
	| { file: string; error: GeoMetadataError };

/**
 * Expand glob patterns; plain paths are kept as given so that missing files
 * are reported rather than silently skipped.
 */
export async function expandInputs(patterns: readonly string[]): Promise<string[]> {
	const files: string[] = [];
	for (const pattern of patterns) {
		if (!hasMagic(pattern)) {
			files.push(pattern);
			continue;
		}
		const matches = await glob(pattern, { nodir: true });
		if (matches.length === 0) {
			logMessage(`No files match "${pattern}".`, "warn");
		}
		files.push(...matches.sort());
	}
	return files;
}

/**
 * Read, parse and validate one file.
 *
 * @param file - Path to a JSON or YAML document
 * @param ruleSet - Rule set to validate against
 * @param options - Key to unwrap and format override
 */
export async function validateFile(
	file: string,
	ruleSet: RuleSet,
	options: { key?: string; format?: DocumentFormat } = {},
): Promise<FileReport> {
	let content: string;
	try {
		content = await fs.promises.readFile(file, "utf-8");
	} catch (error) {
		return { file, error: new GeoMetadataError(`Failed to read ${file}: ${getErrorMessage(error)}`, "READ_ERROR") };
	}

	try {
		let document = parseDocument(content, options.format ?? detectFormat(file), file);
		if (options.key !== undefined) {
			const inner = getMember(document, options.key);
			if (inner === undefined) {
				throw new FormatError(`Document has no "${options.key}" entry.`, {
					code: "MISSING_METADATA_KEY",
					sourcePath: file,
				});
			}
			document = inner;
		}

		const version = asString(getMember(document, "version"));
		if (version !== undefined && !isVersionCompatible(version, ruleSet.version)) {
			logMessage(`${file}: document version ${version} does not match rule set version ${ruleSet.version}.`, "warn");
		}

		const violations = validate(document, ruleSet);
		logMessage(`${file}: ${violations.length} violation(s).`, "debug");
		return { file, violations, diagnostics: renderViolations(violations) };
	} catch (error) {
		return { file, error: wrapError(error, file) };
	}
}

/**
 * Exit code for a set of reports.
 */
export function exitCodeFor(reports: readonly FileReport[]): number {
	if (reports.some((report) => "error" in report)) {
		return EXIT_ERROR;
	}
	if (reports.some((report) => "violations" in report && report.violations.length > 0)) {
		return EXIT_VIOLATIONS;
	}
	return EXIT_OK;
}

/**
 * Human-readable rendering of one report.
 */
export function formatReport(report: FileReport): string {
	if ("error" in report) {
		return `${chalk.red("ERROR")} ${report.file}\n  ${report.error.format().split("\n").join("\n  ")}`;
	}
	if (report.diagnostics.length === 0) {
		return `${chalk.green("PASS")} ${report.file}`;
	}
	const count = report.diagnostics.length;
	const lines = [`${chalk.red("FAIL")} ${report.file} (${count} ${count === 1 ? "violation" : "violations"})`];
	for (const diagnostic of report.diagnostics) {
		lines.push(`  ${formatDiagnostic(diagnostic)}`);
	}
	return lines.join("\n");
}

function toJsonReport(report: FileReport) {
	if ("error" in report) {
		return { file: report.file, valid: false, error: { code: report.error.code, message: report.error.message } };
	}
	return { file: report.file, valid: report.violations.length === 0, diagnostics: report.diagnostics };
}

function parseFormatOption(format: string | undefined): DocumentFormat | undefined {
	if (format === undefined || format === "json" || format === "yaml") {
		return format;
	}
	throw new GeoMetadataError(`Unknown format "${format}".`, "CONFIG_ERROR", { suggestion: "Use json or yaml" });
}

/**
 * Run the validate command.
 *
 * @returns Process exit code
 */
export async function runValidate(
	patterns: readonly string[],
	options: ValidateOptions,
	io: { write?: Writer; env?: NodeJS.ProcessEnv } = {},
): Promise<number> {
	const write = io.write ?? stdoutWriter;

	let ruleSet: RuleSet;
	let key: string | undefined;
	let format: DocumentFormat | undefined;
	try {
		const prepared = prepare(options, io.env);
		ruleSet = prepared.ruleSet;
		key = prepared.config.key;
		format = parseFormatOption(options.format);
	} catch (error) {
		return reportFatal(error);
	}

	const files = await expandInputs(patterns);
	const reports: FileReport[] = [];
	for (const file of files) {
		reports.push(await validateFile(file, ruleSet, { key, format }));
	}

	if (options.json) {
		write(JSON.stringify(reports.map(toJsonReport), null, 2));
	} else {
		for (const report of reports) {
			write(formatReport(report));
		}
	}

	return exitCodeFor(reports);
}

export const validateCommand = new Command("validate")
	.description("Validate GeoParquet metadata documents (JSON or YAML)")
	.argument("<files...>", "Documents to validate; glob patterns are expanded")
	.option("-r, --rules <path>", "Rule set file (default: bundled rule set)")
	.option("-k, --key <name>", 'Validate the value under this top-level key (e.g. "geo")')
	.option("-f, --format <format>", "Input format, json or yaml (default: from the file extension)")
	.option("--json", "Output results as JSON")
	.action(async (files: string[], _options: ValidateOptions, command: Command) => {
		process.exitCode = await runValidate(files, command.optsWithGlobals<ValidateOptions>());
	});
