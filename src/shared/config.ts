/**
 * Engine configuration.
 *
 * Precisions are expressed as decimal places: the internal precision is the
 * fixed-point scale of accumulators, fee rates and open interest; the
 * collateral precision is the scale of amounts handed in by the trading flow.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";

export interface EngineConfig {
	/** Name bound to every log line */
	readonly name: string;
	/** Decimal places of accumulators, fee rates and open interest */
	readonly precisionDecimals: number;
	/** Decimal places of collateral and position sizes */
	readonly collateralDecimals: number;
	/** Share of collateral (percent) a trade may lose before liquidation */
	readonly liqThresholdPct: number;
	readonly logLevel: LogLevel;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	name: "borrowing-fees",
	precisionDecimals: 10,
	collateralDecimals: 18,
	liqThresholdPct: 90,
	logLevel: "info",
};

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/** Mutable builder shape for constructing Partial<EngineConfig>. */
interface MutableEngineConfig {
	name?: string;
	precisionDecimals?: number;
	collateralDecimals?: number;
	liqThresholdPct?: number;
	logLevel?: LogLevel;
}

/**
 * Reads engine config values from environment variables.
 * Supported: BORROWING_NAME, BORROWING_PRECISION_DECIMALS, BORROWING_COLLATERAL_DECIMALS,
 * BORROWING_LIQ_THRESHOLD_PCT, BORROWING_LOG_LEVEL.
 * @throws ConfigError if a variable contains an invalid value
 */
export function configFromEnv(): Partial<EngineConfig> {
	const result: MutableEngineConfig = {};

	const envName = process.env.BORROWING_NAME;
	if (envName) {
		result.name = envName;
	}

	const precision = parseIntEnv("BORROWING_PRECISION_DECIMALS", 1, 30);
	if (precision !== undefined) result.precisionDecimals = precision;

	const collateral = parseIntEnv("BORROWING_COLLATERAL_DECIMALS", 0, 36);
	if (collateral !== undefined) result.collateralDecimals = collateral;

	const threshold = parseIntEnv("BORROWING_LIQ_THRESHOLD_PCT", 1, 100);
	if (threshold !== undefined) result.liqThresholdPct = threshold;

	const level = process.env.BORROWING_LOG_LEVEL;
	if (level) {
		const match = LOG_LEVELS.find((l) => l === level);
		if (match === undefined) {
			throw new ConfigError(`Invalid BORROWING_LOG_LEVEL: "${level}"`, { allowed: LOG_LEVELS });
		}
		result.logLevel = match;
	}

	return result;
}

/** Defaults overlaid with environment overrides and then explicit overrides. */
export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
	return { ...DEFAULT_ENGINE_CONFIG, ...configFromEnv(), ...overrides };
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseIntEnv(envKey: string, min: number, max: number): number | undefined {
	const raw = process.env[envKey];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < min || parsed > max) {
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be an integer in [${min}, ${max}]`);
	}
	return parsed;
}
