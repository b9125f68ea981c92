/**
 * Logger wrapper — domain-agnostic structured logging backed by pino.
 *
 * Auto-redacts opaque credential objects (anything with `__opaque: true`),
 * such as broker session tokens, and supports path-based redaction.
 */

import { pino } from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
	/** Bindings attached to every line, e.g. `{ service: "engine" }` */
	readonly base?: Record<string, unknown>;
}

type LogFn = {
	(msg: string): void;
	(obj: Record<string, unknown>, msg: string): void;
};

/** Structured logger interface with auto-redaction of opaque credentials. */
export interface Logger {
	readonly debug: LogFn;
	readonly info: LogFn;
	readonly warn: LogFn;
	readonly error: LogFn;
	/** Operator alert: a condition that stops automation and needs a human. */
	readonly fatal: LogFn;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Credential serializer ───────────────────────────────────────────

function isOpaqueCredential(value: unknown): boolean {
	return (
		typeof value === "object" && value !== null && "__opaque" in value && value.__opaque === true
	);
}

function redactCredentials(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = isOpaqueCredential(value) ? "[REDACTED]" : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

function levelFn(pinoLogger: pino.Logger, level: Exclude<LogLevel, "trace">): LogFn {
	function log(msgOrObj: string | Record<string, unknown>, msg?: string): void {
		if (typeof msgOrObj === "string") {
			pinoLogger[level](msgOrObj);
		} else {
			pinoLogger[level](redactCredentials(msgOrObj), msg ?? "");
		}
	}
	return log;
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		debug: levelFn(pinoLogger, "debug"),
		info: levelFn(pinoLogger, "info"),
		warn: levelFn(pinoLogger, "warn"),
		error: levelFn(pinoLogger, "error"),
		fatal: levelFn(pinoLogger, "fatal"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(redactCredentials(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino with auto-redaction and optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.child({ component: "exit" }).info({ symbol: "MNQZ5" }, "exit submitted");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};
	if (config.base !== undefined) {
		pinoOptions.base = config.base;
	}

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	const pinoLogger = destination
		? pino(pinoOptions, {
				write(chunk: string): void {
					destination.write(chunk);
				},
			})
		: pino(pinoOptions);

	return wrapPino(pinoLogger);
}

/** Logger that discards everything; the default for components under test. */
export function createSilentLogger(): Logger {
	return wrapPino(pino({ level: "silent" }));
}
