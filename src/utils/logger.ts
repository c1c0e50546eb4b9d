/**
 * Logging for threadlog.
 *
 * One pino root logger writing JSON lines to stderr, with a cached child
 * logger per component. Level comes from LOG_LEVEL and defaults to "warn"
 * so interactive use stays quiet.
 */

import { pino } from "pino";
import { APP_NAME } from "../config.js";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

interface LoggerOptions {
	level?: LogLevel;
	name?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

function levelFromEnv(): LogLevel | undefined {
	const value = process.env.LOG_LEVEL?.trim().toLowerCase();
	return value && isLogLevel(value) ? value : undefined;
}

function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
	const level = options.level ?? levelFromEnv() ?? "warn";

	return pino(
		{
			level,
			name: options.name ?? APP_NAME,
			timestamp: pino.stdTimeFunctions.isoTime,
			formatters: {
				level: (label) => ({ level: label }),
				bindings: (bindings) => ({
					pid: bindings.pid,
					name: bindings.name,
				}),
			},
		},
		// stderr, so command output on stdout stays parseable
		pino.destination(2),
	);
}

let rootLogger: pino.Logger | null = null;
const componentLoggers = new Map<string, pino.Logger>();

function getRootLogger(): pino.Logger {
	if (!rootLogger) {
		rootLogger = createPinoLogger();
	}
	return rootLogger;
}

/**
 * Get the logger for a component. The same instance is returned for the
 * same component name.
 */
export function getLogger(component: string): pino.Logger {
	let logger = componentLoggers.get(component);
	if (!logger) {
		logger = getRootLogger().child({ component });
		componentLoggers.set(component, logger);
	}
	return logger;
}

/** Change the level of the root logger and every component logger. */
export function setLogLevel(level: LogLevel): void {
	getRootLogger().level = level;
	for (const logger of componentLoggers.values()) {
		logger.level = level;
	}
}
