/**
 * geoparquet-lint fixtures: write the fixture catalog as JSON files.
 */

import { Command } from "commander";
import { allCases, invalidCases, materializeFixtures, validCases, type FixtureCase } from "@geoparquet-lint/conformance";
import { GeoMetadataError } from "@geoparquet-lint/core";
import type { CliOptions } from "../config.js";
import { logMessage } from "../utils/log.js";
import { EXIT_OK, prepare, reportFatal, stdoutWriter, type Writer } from "./shared.js";

export type FixturesOptions = CliOptions & {
	only?: string;
};

function selectCases(only: string | undefined): readonly FixtureCase[] {
	switch (only) {
		case undefined:
			return allCases();
		case "valid":
			return validCases();
		case "invalid":
			return invalidCases();
		default:
			throw new GeoMetadataError(`Unknown fixture selection "${only}".`, "CONFIG_ERROR", {
				suggestion: "Use valid or invalid",
			});
	}
}

/**
 * Run the fixtures command.
 *
 * @param outputDir - Directory to write into; created when missing
 * @returns Process exit code
 */
export async function runFixtures(
	outputDir: string,
	options: FixturesOptions,
	io: { write?: Writer; env?: NodeJS.ProcessEnv } = {},
): Promise<number> {
	const write = io.write ?? stdoutWriter;

	try {
		prepare(options, io.env);
		const cases = selectCases(options.only);
		const written = await materializeFixtures(outputDir, cases);
		for (const file of written) {
			logMessage(`Wrote ${file}`, "debug");
		}
		write(`Wrote ${written.length} fixture files to ${outputDir}`);
		return EXIT_OK;
	} catch (error) {
		return reportFatal(error);
	}
}

export const fixturesCommand = new Command("fixtures")
	.description("Write the fixture catalog as standalone JSON documents")
	.argument("<dir>", "Output directory")
	.option("--only <expectation>", "Write only valid or invalid fixtures")
	.action(async (dir: string, _options: FixturesOptions, command: Command) => {
		process.exitCode = await runFixtures(dir, command.optsWithGlobals<FixturesOptions>());
	});
