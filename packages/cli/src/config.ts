/**
 * @title CLI Configuration
 * @description Merge command-line flags, environment variables and defaults.
 *
 * Flags win over the environment, which wins over defaults.
 *
 * @module config
 */

import { GeoMetadataError } from "@geoparquet-lint/core";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "./utils/log.js";

/** Environment variable naming a rule file. */
export const ENV_RULES = "GEOPARQUET_LINT_RULES";
/** Environment variable setting the log level. */
export const ENV_LOG_LEVEL = "GEOPARQUET_LINT_LOG_LEVEL";
/** Environment variable naming the top-level key to unwrap. */
export const ENV_KEY = "GEOPARQUET_LINT_KEY";

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

/**
 * Options as given on the command line.
 */
export type CliOptions = {
	rules?: string;
	logLevel?: string;
	key?: string;
};

/**
 * Effective configuration for one run.
 */
export interface CliConfig {
	/** Rule file to load; the bundled rule set when absent. */
	rulesPath?: string;
	logLevel: LogLevel;
	/** Top-level key holding the metadata (e.g. "geo" for fixture files). */
	key?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
	return value === undefined || value.trim() === "" ? undefined : value;
}

/**
 * Resolve the configuration for a run.
 *
 * @param options - Command-line options
 * @param env - Environment (default: process.env)
 * @throws GeoMetadataError if the log level is not recognised
 */
export function resolveConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): CliConfig {
	const level = nonEmpty(options.logLevel) ?? nonEmpty(env[ENV_LOG_LEVEL]) ?? DEFAULT_LOG_LEVEL;
	if (!isLogLevel(level)) {
		throw new GeoMetadataError(`Unknown log level "${level}".`, "CONFIG_ERROR", {
			suggestion: `Use one of: ${LOG_LEVELS.join(", ")}`,
		});
	}

	return {
		rulesPath: nonEmpty(options.rules) ?? nonEmpty(env[ENV_RULES]),
		logLevel: level,
		key: nonEmpty(options.key) ?? nonEmpty(env[ENV_KEY]),
	};
}
