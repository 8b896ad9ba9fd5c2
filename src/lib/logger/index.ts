/**
 * Logger wrapper: domain-agnostic structured logging backed by pino.
 *
 * Bigint fields (amounts, accumulators) are rendered as decimal strings so
 * log lines stay exact, and path-based redaction can hide selected fields.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Bigint serializer ───────────────────────────────────────────────

function stringifyBigInts(value: unknown): unknown {
	if (typeof value === "bigint") return value.toString();
	if (Array.isArray(value)) return value.map(stringifyBigInts);
	if (value === null || typeof value !== "object") return value;
	if (value instanceof Error) return value;

	const result: Record<string, unknown> = {};
	for (const [key, inner] of Object.entries(value)) {
		result[key] = stringifyBigInts(inner);
	}
	return result;
}

function toFields(obj: object): Record<string, unknown> {
	const fields: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		fields[key] = stringifyBigInts(value);
	}
	return fields;
}

// ── Factory ─────────────────────────────────────────────────────────

type LevelMethod = "info" | "warn" | "error" | "debug";

function wrapPino(pinoLogger: pino.Logger): Logger {
	const write =
		(level: LevelMethod) =>
		(msgOrObj: unknown, msg?: string): void => {
			if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
				pinoLogger[level](String(msgOrObj ?? ""));
			} else if (typeof msgOrObj === "object") {
				pinoLogger[level](toFields(msgOrObj), msg ?? "");
			} else {
				pinoLogger[level](String(msgOrObj));
			}
		};

	return {
		info: write("info"),
		warn: write("warn"),
		error: write("error"),
		debug: write("debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(toFields(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional redaction and custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ pairIndex: 7, accFeeLong: 25n }, "pair settled");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

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

/** Logger that discards everything, for tests and embedding hosts. */
export function silentLogger(): Logger {
	return createLogger({ level: "fatal", destination: { write: () => {} } });
}
