/**
 * @geoparquet-lint/cli - Command-line front end for the metadata validator.
 */

export * from "./commands/index.js";
export { type CliOptions, type CliConfig, resolveConfig, ENV_RULES, ENV_LOG_LEVEL, ENV_KEY, DEFAULT_LOG_LEVEL } from "./config.js";
export { type LogLevel, type LogSink, LOG_LEVELS, logMessage, setLogLevel, getLogLevel, setLogSink, isLogLevel } from "./utils/log.js";
