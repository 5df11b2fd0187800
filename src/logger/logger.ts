import pino, { type Logger as PinoLogger } from "pino";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
	level?: string;
	name?: string;
}

/**
 * Root logger. Writes JSON lines to stderr: stdout carries the MCP stdio protocol.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
	return pino(
		{
			level: options.level ?? "info",
			name: options.name ?? "docs-retrieval-mcp",
			timestamp: pino.stdTimeFunctions.isoTime,
			redact: {
				paths: ["apiKey", "*.apiKey", "headers.authorization", "headers.apikey"],
				censor: "[REDACTED]",
			},
		},
		pino.destination(2),
	);
}

/**
 * Logger that drops everything, for tests and programmatic use
 */
export function createSilentLogger(): Logger {
	return pino({ level: "silent" });
}
