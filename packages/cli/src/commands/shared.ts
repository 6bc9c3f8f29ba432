/**
 * Helpers shared by the commands: output, configuration and rule set
 * loading, and exit codes.
 */

import { defaultRuleSet, loadRuleSet, wrapError, type RuleSet } from "@geoparquet-lint/core";
import { resolveConfig, type CliConfig, type CliOptions } from "../config.js";
import { logMessage, setLogLevel } from "../utils/log.js";

/** Exit code when every input is valid. */
export const EXIT_OK = 0;
/** Exit code when at least one input has violations. */
export const EXIT_VIOLATIONS = 1;
/** Exit code when an input, the rule set or the configuration could not be used. */
export const EXIT_ERROR = 2;

/**
 * Receives command output, one block of text per call.
 */
export type Writer = (text: string) => void;

export const stdoutWriter: Writer = (text) => {
	process.stdout.write(`${text}\n`);
};

/**
 * Resolve configuration, apply the log level and load the rule set.
 *
 * @throws GeoMetadataError on configuration or rule set problems
 */
export function prepare(
	options: CliOptions,
	env: NodeJS.ProcessEnv = process.env,
): { config: CliConfig; ruleSet: RuleSet } {
	const config = resolveConfig(options, env);
	setLogLevel(config.logLevel);

	const ruleSet = config.rulesPath ? loadRuleSet(config.rulesPath) : defaultRuleSet();
	logMessage(
		`Using rule set ${ruleSet.id} ${ruleSet.version}${config.rulesPath ? ` from ${config.rulesPath}` : ""}.`,
		"debug",
	);

	return { config, ruleSet };
}

/**
 * Log an error that stops a command and return the matching exit code.
 */
export function reportFatal(error: unknown): number {
	logMessage(wrapError(error).format(), "error");
	return EXIT_ERROR;
}
