import winston from "winston";

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

function resolveInitialLevel(): LogLevel {
	const raw = process.env.FUZZPATCH_LOG_LEVEL;
	return raw !== undefined && isLogLevel(raw) ? raw : "warn";
}

const winstonLogger = winston.createLogger({
	level: resolveInitialLevel(),
	format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
	transports: [
		new winston.transports.Console({
			// Everything goes to stderr so stdout stays free for tool output
			stderrLevels: [...LOG_LEVELS],
		}),
	],
});

export interface Logger {
	error(message: string, context?: Record<string, unknown>): void;
	warn(message: string, context?: Record<string, unknown>): void;
	info(message: string, context?: Record<string, unknown>): void;
	debug(message: string, context?: Record<string, unknown>): void;
	setLevel(level: LogLevel): void;
}

export const logger: Logger = {
	error(message, context) {
		winstonLogger.error(message, context);
	},
	warn(message, context) {
		winstonLogger.warn(message, context);
	},
	info(message, context) {
		winstonLogger.info(message, context);
	},
	debug(message, context) {
		winstonLogger.debug(message, context);
	},
	setLevel(level) {
		winstonLogger.level = level;
	},
};
