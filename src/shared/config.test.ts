import { afterEach, describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_CONFIG, configFromEnv, resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";

const KEYS = [
	"BORROWING_NAME",
	"BORROWING_PRECISION_DECIMALS",
	"BORROWING_COLLATERAL_DECIMALS",
	"BORROWING_LIQ_THRESHOLD_PCT",
	"BORROWING_LOG_LEVEL",
];

function clearEnv(): void {
	for (const key of KEYS) {
		Reflect.deleteProperty(process.env, key);
	}
}

describe("EngineConfig", () => {
	afterEach(clearEnv);

	describe("DEFAULT_ENGINE_CONFIG", () => {
		it("uses 1e10 internal precision and 18-decimal collateral", () => {
			expect(DEFAULT_ENGINE_CONFIG.precisionDecimals).toBe(10);
			expect(DEFAULT_ENGINE_CONFIG.collateralDecimals).toBe(18);
			expect(DEFAULT_ENGINE_CONFIG.liqThresholdPct).toBe(90);
			expect(DEFAULT_ENGINE_CONFIG.logLevel).toBe("info");
		});
	});

	describe("configFromEnv", () => {
		it("returns empty object when no BORROWING_ env vars", () => {
			clearEnv();
			expect(configFromEnv()).toEqual({});
		});

		it("reads every supported variable", () => {
			process.env.BORROWING_NAME = "venue-a";
			process.env.BORROWING_PRECISION_DECIMALS = "12";
			process.env.BORROWING_COLLATERAL_DECIMALS = "6";
			process.env.BORROWING_LIQ_THRESHOLD_PCT = "85";
			process.env.BORROWING_LOG_LEVEL = "debug";
			expect(configFromEnv()).toEqual({
				name: "venue-a",
				precisionDecimals: 12,
				collateralDecimals: 6,
				liqThresholdPct: 85,
				logLevel: "debug",
			});
		});

		it("rejects non-integer values", () => {
			process.env.BORROWING_PRECISION_DECIMALS = "1.5";
			expect(() => configFromEnv()).toThrow(ConfigError);
		});

		it("rejects values out of range", () => {
			process.env.BORROWING_LIQ_THRESHOLD_PCT = "101";
			expect(() => configFromEnv()).toThrow(
				'Invalid BORROWING_LIQ_THRESHOLD_PCT: "101" must be an integer in [1, 100]',
			);
		});

		it("rejects unknown log levels", () => {
			process.env.BORROWING_LOG_LEVEL = "verbose";
			expect(() => configFromEnv()).toThrow(ConfigError);
		});
	});

	describe("resolveConfig", () => {
		it("layers defaults, environment and overrides", () => {
			process.env.BORROWING_COLLATERAL_DECIMALS = "6";
			process.env.BORROWING_NAME = "from-env";
			const config = resolveConfig({ name: "explicit" });
			expect(config).toEqual({
				...DEFAULT_ENGINE_CONFIG,
				collateralDecimals: 6,
				name: "explicit",
			});
		});
	});
});
