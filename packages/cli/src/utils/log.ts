import chalk from "chalk";

/**
 * Log levels, from least to most verbose.
 */
export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Receives formatted log lines.
 */
export type LogSink = (line: string) => void;

const defaultSink: LogSink = (line) => {
	process.stderr.write(`${line}\n`);
};

const LEVEL_COLOURS: Record<LogLevel, (text: string) => string> = {
	error: (text) => chalk.red(text),
	warn: (text) => chalk.yellow(text),
	info: (text) => chalk.cyan(text),
	debug: (text) => chalk.gray(text),
};

let currentLevel: LogLevel = "warn";
let sink: LogSink = defaultSink;

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Set the most verbose level that is still written.
 */
export function setLogLevel(level: LogLevel): void {
	currentLevel = level;
}

export function getLogLevel(): LogLevel {
	return currentLevel;
}

/**
 * Redirect log output (stderr by default). Pass nothing to restore stderr.
 */
export function setLogSink(next?: LogSink): void {
	sink = next ?? defaultSink;
}

/**
 * Logs a message if its level is at or below the configured log level.
 *
 * @param {string} message - The message to log.
 * @param {LogLevel} [type="info"] - The level of the message.
 */
export function logMessage(message: string, type: LogLevel = "info"): void {
	if (LOG_LEVELS.indexOf(type) <= LOG_LEVELS.indexOf(currentLevel)) {
		sink(`${LEVEL_COLOURS[type](type)} ${message}`);
	}
}
