export {
	type TraderAddress,
	type PositionKey,
	traderAddress,
	assertIndex,
	positionKeyToString,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	collect,
	unwrap,
	isOk,
	isErr,
} from "./result.js";

export {
	ErrorCategory,
	BorrowingError,
	InvalidParameterError,
	AccessDeniedError,
	CapacityOverflowError,
	ConfigError,
	SystemError,
	classifyError,
	isInvalidParameter,
	isAccessDenied,
	isCapacityOverflow,
} from "./errors.js";

export { type BlockClock, FakeBlockClock } from "./block-clock.js";
export { BoundedUint, UINT72_MAX } from "./bounded-uint.js";
export { pow10, rescale, parseUnits, formatUnits, maxBigInt } from "./fixed-point.js";
export {
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./config.js";
