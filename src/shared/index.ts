export {
	type AccountId,
	type SymbolId,
	type OrderId,
	type FillId,
	type PositionKey,
	accountId,
	symbolId,
	orderId,
	fillId,
	positionKey,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	tryCatchAsync,
} from "./result.js";

export {
	ErrorCategory,
	TradingError,
	NetworkError,
	TimeoutError,
	RateLimitError,
	AuthError,
	RejectError,
	NotFoundError,
	ConflictingIntentError,
	DriftDetectedError,
	LedgerCorruptionError,
	ConfigError,
	SystemError,
	classifyError,
	toError,
	isRejectError,
	isConflictingIntent,
	isTimeoutError,
	isNotFoundError,
} from "./errors.js";

export { Decimal } from "./decimal.js";

export {
	type Clock,
	type DeadlineOutcome,
	SystemClock,
	FakeClock,
	Duration,
	utcDayKey,
	sleep,
	withDeadline,
} from "./time.js";

export {
	PositionSide,
	type OpenSide,
	OrderSide,
	sideSign,
	sideOfQuantity,
	orderSign,
	entryOrderSide,
	closingOrderSide,
} from "./side.js";

export { type ContractSpec, ContractBook, pointValue, rootSymbol } from "./contracts.js";

export {
	ExitRejectionPolicy,
	type EngineConfig,
	type EngineConfigOverrides,
	type RateLimitSettings,
	type QueryRetrySettings,
	DEFAULT_ENGINE_CONFIG,
	resolveEngineConfig,
	configFromEnv,
} from "./config.js";
