import pino, { type Logger, type LoggerOptions } from "pino";
import { LOG_LEVELS, type LogLevel, type NodeLoggerOptions, type RunContext } from "./types.js";

export function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Resolve a log level from an environment value, falling back when the
 * value is unset or not a pino level.
 */
export function resolveLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
	if (value === undefined) {
		return fallback;
	}
	const normalized = value.trim().toLowerCase();
	return isLogLevel(normalized) ? normalized : fallback;
}

export function createNodeLogger(options: NodeLoggerOptions): Logger {
	const {
		service,
		level = "info",
		environment,
		version,
		pretty,
		base = {},
		destination,
		pinoOptions = {},
	} = options;

	const isPretty = pretty ?? process.env.NODE_ENV === "development";

	// Replacing base drops pid and hostname from every line.
	const bindings: Record<string, unknown> = { service, ...base };
	if (environment !== undefined) {
		bindings.environment = environment;
	}
	if (version !== undefined) {
		bindings.version = version;
	}

	const loggerOptions: LoggerOptions = {
		level,
		formatters: {
			level: (label) => ({ severity: label.toUpperCase() }),
		},
		timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
		base: bindings,
		...pinoOptions,
	};

	if (isPretty) {
		return pino(
			loggerOptions,
			pino.transport({
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "SYS:HH:MM:ss",
					ignore: "service,environment,version",
					customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
					singleLine: true,
				},
			}),
		);
	}

	if (destination) {
		return pino(loggerOptions, destination);
	}

	return pino(loggerOptions);
}

export function withRunContext(logger: Logger, context: RunContext): Logger {
	const bindings: Record<string, unknown> = { runId: context.runId };
	if (context.environment !== undefined) {
		bindings.environment = context.environment;
	}
	if (context.symbolCount !== undefined) {
		bindings.symbolCount = context.symbolCount;
	}
	return logger.child(bindings);
}
