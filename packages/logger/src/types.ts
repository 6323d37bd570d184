import type { DestinationStream, LevelWithSilent, LoggerOptions } from "pino";

export type LogLevel = LevelWithSilent;

export const LOG_LEVELS: readonly LogLevel[] = [
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
];

export interface NodeLoggerOptions {
	/** Service name bound on every line */
	service: string;
	level?: LogLevel;
	/** Deployment environment (development, production, test) */
	environment?: string;
	version?: string;
	/** Human-readable output through pino-pretty. Defaults to NODE_ENV === "development" */
	pretty?: boolean;
	/** Extra bindings merged into the base object */
	base?: Record<string, unknown>;
	/** Write to this stream instead of stdout. Ignored when pretty is on. */
	destination?: DestinationStream;
	pinoOptions?: Partial<LoggerOptions>;
}

/**
 * Bindings attached to every line logged during one metrics run.
 */
export interface RunContext {
	runId: string;
	environment?: string;
	symbolCount?: number;
}
