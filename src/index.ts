// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type TraderAddress,
	type PositionKey,
	traderAddress,
	positionKeyToString,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrap,
	collect,
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
	type BlockClock,
	FakeBlockClock,
	BoundedUint,
	UINT72_MAX,
	pow10,
	rescale,
	parseUnits,
	formatUnits,
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./shared/index.js";

// ── Events ───────────────────────────────────────────────────────────
export {
	type BorrowingEvent,
	type BorrowingEventType,
	type PairAccFeesUpdated,
	type GroupAccFeesUpdated,
	type GroupOiUpdated,
	type PairGroupUpdated,
	type PairParamsUpdated,
	type GroupUpdated,
	type TradeInitialAccFeesStored,
	type TradeActionHandled,
	type HandlerErrorCallback,
	EventDispatcher,
	EventQueue,
} from "./events/index.js";

// ── Borrowing fees ───────────────────────────────────────────────────
export {
	UNGROUPED,
	type Group,
	type PairGroup,
	type Pair,
	type InitialAccFees,
	type SideValues,
	type PendingAccFees,
	type PairParams,
	type GroupParams,
	type TradeAction,
	type TradeFeeInput,
	type LiquidationPriceInput,
	type PendingAccFeesInput,
	type FeeRateModel,
	netOiUtilizationModel,
	type LiquidationPriceParams,
	type LiquidationPriceFormula,
	thresholdLiquidationPrice,
	Capability,
	type AccessPolicy,
	RoleAccessPolicy,
	type PairOpenInterestSource,
	InMemoryPositionLedger,
	type BorrowingLedger,
	InMemoryBorrowingLedger,
	AccumulatorSettlement,
	OpenInterestTracker,
	TransitionLog,
	GroupReassignment,
	TradeFeeResolver,
	type BorrowingFeesEngineDeps,
	BorrowingFeesEngine,
} from "./borrowing/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export {
	type Logger,
	type LoggerConfig,
	type LogLevel,
	createLogger,
	silentLogger,
} from "./lib/logger/index.js";
export {
	z,
	ValidationError,
	type ValidationIssue,
	validate,
} from "./lib/validation/index.js";
