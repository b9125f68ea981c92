// ── Shared Kernel ──────────────────────────────────────────────────────
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
	Decimal,
	type Clock,
	type DeadlineOutcome,
	SystemClock,
	FakeClock,
	Duration,
	utcDayKey,
	sleep,
	withDeadline,
	PositionSide,
	type OpenSide,
	OrderSide,
	sideSign,
	sideOfQuantity,
	orderSign,
	entryOrderSide,
	closingOrderSide,
	type ContractSpec,
	ContractBook,
	pointValue,
	rootSymbol,
	ExitRejectionPolicy,
	type EngineConfig,
	type EngineConfigOverrides,
	type RateLimitSettings,
	type QueryRetrySettings,
	DEFAULT_ENGINE_CONFIG,
	resolveEngineConfig,
	configFromEnv,
} from "./shared/index.js";

// ── Broker ─────────────────────────────────────────────────────────────
export {
	OrderType,
	OrderPurpose,
	type ExitOrderIntent,
	type MarketOrderIntent,
	type LimitOrderIntent,
	type OrderIntent,
	type OrderRequest,
	createOrderIntent,
	isLimitIntent,
	type PlacedOrder,
	type BrokerPosition,
	type BrokerFill,
	type BrokerApi,
	BrokerEnvironment,
	type BrokerAccount,
	OrderStatus,
	type BrokerEvent,
	type BrokerEventHandler,
} from "./broker/types.js";
export {
	type BrokerGatewayOptions,
	BrokerGateway,
} from "./broker/broker-gateway.js";
export {
	CallKind,
	computeDelay,
	CallPolicy,
} from "./broker/call-policy.js";
export {
	type TrackedOrder,
	OrderRegistry,
} from "./broker/order-registry.js";
export {
	type CancelFailure,
	type CancelReport,
	OrderDesk,
} from "./broker/order-desk.js";
export {
	type PaperBrokerConfig,
	PaperBroker,
} from "./broker/paper-broker.js";
export {
	encodeRequest,
	encodeAuthorize,
	encodeSyncRequest,
	HEARTBEAT_FRAME,
	type BrokerResponse,
	type DecodedFrame,
	decodeFrame,
} from "./broker/frame-codec.js";
export {
	type BrokerStreamEvents,
	type BrokerStreamOptions,
	BrokerStream,
} from "./broker/broker-stream.js";
export {
	SessionToken,
	revealSessionToken,
	tokenFingerprint,
} from "./auth/session-token.js";

// ── Market Data ────────────────────────────────────────────────────────
export {
	type Candle,
} from "./market/types.js";
export {
	type Quote,
	type PriceFeedEvents,
	type PriceFeedConfig,
	PriceFeed,
} from "./market/price-feed.js";
export {
	type BarAggregatorConfig,
	BarAggregator,
} from "./market/bar-aggregator.js";
export {
	trueRange,
	calcATR,
} from "./market/atr.js";

// ── Ledger ─────────────────────────────────────────────────────────────
export {
	FillRole,
	type Fill,
	fillRoleFor,
	fillFromBroker,
	type Attention,
	type Halt,
	type Position,
	flatPosition,
	DriftResolution,
	type DriftRecord,
} from "./ledger/types.js";
export {
	type LedgerStore,
} from "./ledger/store.js";
export {
	type LedgerEvents,
	type PositionLedgerConfig,
	type RecordFillOptions,
	PositionLedger,
} from "./ledger/position-ledger.js";
export {
	type Holding,
	FLAT_HOLDING,
	type FillEffect,
	classifyFill,
	isGrowth,
	opensLifecycle,
	applyFill,
	foldFills,
	duplicateFillIds,
} from "./ledger/position-math.js";
export {
	MemoryLedgerStore,
} from "./ledger/memory-store.js";
export {
	type FileLedgerStoreConfig,
	type CorruptLine,
	FileLedgerStore,
} from "./ledger/file-store.js";

// ── DCA ────────────────────────────────────────────────────────────────
export {
	TriggerMode,
	type DcaRung,
	type DcaConfig,
	dcaConfigSchema,
	type DcaConfigInput,
	parseDcaConfig,
	encodeDcaConfig,
} from "./dca/types.js";
export {
	adverseExcursion,
	type RungDecision,
	selectRung,
	takeProfitPrice,
	stopLossPrice,
	ticksBetween,
} from "./dca/trigger.js";
export {
	type DcaEngineConfig,
	type DcaSkipReason,
	type DcaOutcome,
	type TakeProfitOutcome,
	DcaEngine,
} from "./dca/dca-engine.js";

// ── PnL ────────────────────────────────────────────────────────────────
export {
	realizedPnlFor,
	unrealizedPnlFor,
	type Marks,
	ZERO_MARKS,
	markToMarket,
} from "./pnl/pnl-math.js";
export {
	type PnlSummary,
	summarizePnl,
	PnlEngine,
} from "./pnl/pnl-engine.js";

// ── Exit ───────────────────────────────────────────────────────────────
export {
	ExitState,
	ExitTrigger,
	type ExitTransition,
	MAX_EXIT_HISTORY,
	nextExitState,
	isExitInFlight,
	appendTransition,
} from "./exit/exit-state.js";
export {
	ExitEpochs,
} from "./exit/exit-epoch.js";
export {
	type ExitSignal,
	type OpenPosition,
	type ExitCondition,
	StopLossTicks,
	TakeProfitTicks,
	ExitConditions,
} from "./exit/exit-conditions.js";
export {
	type ExitMachineConfig,
	type RejectionResolution,
	type ExitOutcome,
	ExitMachine,
} from "./exit/exit-machine.js";
export {
	type ConfirmationLoopConfig,
	ConfirmationLoop,
} from "./exit/confirmation-loop.js";
export {
	type KillSwitchReport,
	type Flattener,
	type KillSwitchConfig,
	KillSwitch,
} from "./exit/kill-switch.js";

// ── Reconciliation ─────────────────────────────────────────────────────
export {
	type ReconcileOptions,
	type ReconcileOutcome,
	type PositionCorrector,
	type DriftReconcilerConfig,
	DriftReconciler,
} from "./reconcile/drift-reconciler.js";

// ── Risk ───────────────────────────────────────────────────────────────
export {
	type LossLimitMonitorConfig,
	type LossCheck,
	LossLimitMonitor,
} from "./risk/loss-limit-monitor.js";

// ── Events & Alerts ────────────────────────────────────────────────────
export {
	AlertSeverity,
	type EngineAlert,
	type ScaleInRejected,
	type ExitRejected,
	type ExitConfirmTimedOut,
	type KillSwitchDeadlineExceeded,
	type LedgerCorrupted,
	type DriftCorrected,
	type FillRefused,
	type DailyLossExceeded,
	type EngineAlertType,
} from "./events/alerts.js";
export {
	type HandlerErrorCallback,
	AlertDispatcher,
} from "./events/alert-dispatcher.js";

// ── Observability ──────────────────────────────────────────────────────
export {
	type LatencySnapshot,
	LatencyHistogram,
} from "./observability/latency-histogram.js";

// ── Engine ─────────────────────────────────────────────────────────────
export {
	type Scheduler,
	SymbolLoop,
} from "./engine/symbol-loop.js";
export {
	type BrokerEventSource,
	type BrokerEventLoopConfig,
	BrokerEventLoop,
} from "./engine/broker-event-loop.js";
export {
	type TradingEngineOptions,
	type OpenOutcome,
	type PositionStatus,
	TradingEngine,
} from "./engine/trading-engine.js";

// ── Infrastructure ─────────────────────────────────────────────────────
export {
	type LogLevel,
	type LoggerConfig,
	type Logger,
	createLogger,
	createSilentLogger,
} from "./lib/logger/index.js";
export {
	type ValidationIssue,
	ValidationError,
	formatIssues,
	validate,
} from "./lib/validation/index.js";
export {
	type WsConfig,
	type WsState,
	type WsOpenHandler,
	type WsMessageHandler,
	type WsCloseHandler,
	type WsErrorHandler,
	type WsClientLike,
} from "./lib/websocket/types.js";
export {
	type ReconnectionConfig,
	DEFAULT_RECONNECTION,
	ReconnectionPolicy,
} from "./lib/websocket/reconnection.js";
export {
	WsClient,
} from "./lib/websocket/client.js";
