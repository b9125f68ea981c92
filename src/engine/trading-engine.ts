/**
 * TradingEngine — the facade wiring every component for a set of accounts.
 *
 * Commands for one (account, symbol) run in that position's slot of the
 * SymbolLoop, serialized with the broker events for it. The kill switch
 * is the exception: `requestForceFlatten` bypasses the slot.
 *
 * @example
 * ```ts
 * const engine = new TradingEngine({ store: new FileLedgerStore(dir), config: configFromEnv() });
 * engine.registerAccount(account, (handler) => broker.subscribe(handler));
 * await engine.start();
 * await engine.openOrScalePosition(accountId, symbol, "long", 1, {
 *   triggerMode: "TICKS",
 *   rungs: [{ distance: 20, quantity: 1 }],
 *   maxQuantity: 3,
 *   takeProfitTicks: 40,
 * });
 * ```
 */

import { BrokerGateway } from "../broker/broker-gateway.js";
import { OrderDesk } from "../broker/order-desk.js";
import { OrderRegistry } from "../broker/order-registry.js";
import { OrderPurpose, OrderType } from "../broker/types.js";
import type { BrokerAccount } from "../broker/types.js";
import { DcaEngine } from "../dca/dca-engine.js";
import { parseDcaConfig } from "../dca/types.js";
import { AlertDispatcher } from "../events/alert-dispatcher.js";
import { ConfirmationLoop } from "../exit/confirmation-loop.js";
import { ExitConditions } from "../exit/exit-conditions.js";
import { ExitEpochs } from "../exit/exit-epoch.js";
import { ExitMachine } from "../exit/exit-machine.js";
import type { ExitOutcome } from "../exit/exit-machine.js";
import { ExitState, ExitTrigger } from "../exit/exit-state.js";
import { KillSwitch } from "../exit/kill-switch.js";
import type { KillSwitchReport } from "../exit/kill-switch.js";
import { MemoryLedgerStore } from "../ledger/memory-store.js";
import { PositionLedger } from "../ledger/position-ledger.js";
import type { LedgerStore } from "../ledger/store.js";
import type { Attention, DriftRecord, Halt, Position } from "../ledger/types.js";
import type { Logger } from "../lib/logger/index.js";
import { createLogger } from "../lib/logger/index.js";
import { PriceFeed } from "../market/price-feed.js";
import { PnlEngine } from "../pnl/pnl-engine.js";
import type { PnlSummary } from "../pnl/pnl-engine.js";
import { DriftReconciler } from "../reconcile/drift-reconciler.js";
import { LossLimitMonitor } from "../risk/loss-limit-monitor.js";
import { resolveEngineConfig } from "../shared/config.js";
import type { EngineConfig, EngineConfigOverrides } from "../shared/config.js";
import { ContractBook } from "../shared/contracts.js";
import type { Decimal } from "../shared/decimal.js";
import { ConflictingIntentError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { positionKey } from "../shared/identifiers.js";
import type { AccountId, OrderId, PositionKey, SymbolId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type OpenSide, PositionSide, entryOrderSide } from "../shared/side.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { BrokerEventLoop } from "./broker-event-loop.js";
import type { BrokerEventSource } from "./broker-event-loop.js";
import { SymbolLoop } from "./symbol-loop.js";

export interface TradingEngineOptions {
	/** Defaults to an in-memory store */
	readonly store?: LedgerStore;
	readonly config?: EngineConfigOverrides;
	readonly contracts?: ContractBook;
	readonly clock?: Clock;
	/** Defaults to a pino logger at `config.logLevel` */
	readonly logger?: Logger;
}

export interface OpenOutcome {
	readonly orderId: OrderId;
	readonly quantity: number;
	readonly position: Position;
}

export interface PositionStatus {
	readonly position: Position;
	readonly exitState: ExitState;
	readonly pnl: PnlSummary;
	readonly driftRecords: readonly DriftRecord[];
	readonly flattening: boolean;
	readonly attention: Attention | null;
	readonly halted: Halt | null;
	readonly lastError: string | null;
}

export class TradingEngine {
	readonly config: EngineConfig;
	readonly gateway: BrokerGateway;
	readonly registry: OrderRegistry;
	readonly ledger: PositionLedger;
	readonly prices: PriceFeed;
	readonly alerts: AlertDispatcher;
	readonly killSwitch: KillSwitch;
	readonly reconciler: DriftReconciler;
	readonly lossLimit: LossLimitMonitor;
	private readonly loop: SymbolLoop;
	/** Latest price for each position whose tick task has not started yet */
	private readonly pendingTicks = new Map<PositionKey, Decimal>();
	private readonly desk: OrderDesk;
	private readonly epochs = new ExitEpochs();
	private readonly confirmation: ConfirmationLoop;
	private readonly exits: ExitMachine;
	private readonly dca: DcaEngine;
	private readonly pnl: PnlEngine;
	private readonly events: BrokerEventLoop;
	private readonly conditions = ExitConditions.standard();
	private readonly contracts: ContractBook;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private auditTimer: ReturnType<typeof setInterval> | null = null;
	private running = false;

	/** @throws ConfigError when the merged configuration is invalid */
	constructor(options: TradingEngineOptions = {}) {
		this.config = resolveEngineConfig(options.config);
		this.clock = options.clock ?? SystemClock;
		this.logger = options.logger ?? createLogger({ level: this.config.logLevel });
		this.contracts = options.contracts ?? new ContractBook();
		const clock = this.clock;
		const logger = this.logger;
		const store = options.store ?? new MemoryLedgerStore();

		this.loop = new SymbolLoop(logger);
		this.gateway = new BrokerGateway({
			rateLimit: this.config.rateLimit,
			queryRetry: this.config.queryRetry,
			clock,
			logger: logger.child({ component: "gateway" }),
		});
		this.registry = new OrderRegistry(clock);
		this.desk = new OrderDesk(this.gateway, this.registry, logger);
		this.ledger = new PositionLedger({ store, contracts: this.contracts, clock, logger });
		this.prices = new PriceFeed({ clock });
		this.alerts = new AlertDispatcher((e) => {
			logger.error({ error: String(e) }, "alert handler threw");
		});
		this.pnl = new PnlEngine(this.ledger);

		this.reconciler = new DriftReconciler({
			ledger: this.ledger,
			gateway: this.gateway,
			store,
			prices: this.prices,
			alerts: this.alerts,
			registry: this.registry,
			clock,
			logger,
		});
		this.killSwitch = new KillSwitch({
			ledger: this.ledger,
			desk: this.desk,
			gateway: this.gateway,
			alerts: this.alerts,
			epochs: this.epochs,
			corrector: this.reconciler,
			schedule: this.loop.schedule,
			deadlineMs: this.config.killSwitchDeadlineMs,
			pollIntervalMs: this.config.killSwitchPollIntervalMs,
			clock,
			logger,
		});
		this.confirmation = new ConfirmationLoop({
			ledger: this.ledger,
			gateway: this.gateway,
			corrector: this.reconciler,
			flattener: this.killSwitch,
			alerts: this.alerts,
			epochs: this.epochs,
			schedule: this.loop.schedule,
			pollIntervalMs: this.config.confirmPollIntervalMs,
			timeoutMs: this.config.confirmTimeoutMs,
			clock,
			logger,
		});
		this.exits = new ExitMachine({
			ledger: this.ledger,
			desk: this.desk,
			gateway: this.gateway,
			corrector: this.reconciler,
			flattener: this.killSwitch,
			confirmation: this.confirmation,
			alerts: this.alerts,
			epochs: this.epochs,
			policy: this.config.exitRejectionPolicy,
			clock,
			logger,
		});
		this.dca = new DcaEngine({
			ledger: this.ledger,
			desk: this.desk,
			prices: this.prices,
			alerts: this.alerts,
			takeProfitMinTicks: this.config.takeProfitMinTicks,
			contracts: this.contracts,
			clock,
			logger,
		});
		this.lossLimit = new LossLimitMonitor({
			ledger: this.ledger,
			flattener: this.killSwitch,
			alerts: this.alerts,
			maxDailyLoss: this.config.maxDailyLoss,
			clock,
			logger,
		});
		this.events = new BrokerEventLoop({
			loop: this.loop,
			ledger: this.ledger,
			registry: this.registry,
			exits: this.exits,
			dca: this.dca,
			corrector: this.reconciler,
			alerts: this.alerts,
			clock,
			logger,
		});
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	/** Registers a broker account and, when given, the source of its push events. */
	registerAccount(account: BrokerAccount, source?: BrokerEventSource): void {
		this.gateway.registerAccount(account);
		if (source !== undefined) this.events.attach(source);
	}

	/**
	 * Restores the ledger, audits every restored position against the broker
	 * and starts the periodic drift audit.
	 * @returns the number of positions restored
	 */
	async start(): Promise<Result<number, TradingError>> {
		if (this.running) return ok(this.ledger.positions().length);
		const loaded = await this.ledger.load();
		if (!loaded.ok) {
			this.logger.fatal({ error: loaded.error.message }, "ledger load failed; engine not started");
			return loaded;
		}
		this.running = true;
		this.audit();
		if (this.config.reconcileIntervalMs > 0) {
			this.auditTimer = setInterval(() => this.audit(), this.config.reconcileIntervalMs);
			this.auditTimer.unref();
		}
		this.logger.info(
			{ positions: loaded.value, reconcileIntervalMs: this.config.reconcileIntervalMs },
			"engine started",
		);
		return loaded;
	}

	/** Stops timers and event intake, then waits for queued tasks to finish. */
	async stop(): Promise<void> {
		this.running = false;
		if (this.auditTimer !== null) {
			clearInterval(this.auditTimer);
			this.auditTimer = null;
		}
		this.events.detachAll();
		this.confirmation.stopAll();
		this.lossLimit.dispose();
		await this.loop.close();
		this.logger.info("engine stopped");
	}

	// ── Commands ───────────────────────────────────────────────────

	/**
	 * Opens a position, or adds to one on the same side, with a market entry.
	 * The DCA settings replace the position's current ones. Refused while an
	 * exit or flatten is in flight, when the position is on the other side,
	 * or when the total would exceed `maxQuantity`.
	 */
	async openOrScalePosition(
		accountId: AccountId,
		symbol: SymbolId,
		side: OpenSide,
		quantity: number,
		dcaConfig: unknown,
	): Promise<Result<OpenOutcome, TradingError>> {
		const config = parseDcaConfig(dcaConfig);
		if (!config.ok) return config;
		return this.loop.run(positionKey(accountId, symbol), async () => {
			const position = this.ledger.currentPosition(accountId, symbol);
			const refusal = this.entryRefusal(position, side, quantity, config.value.maxQuantity);
			if (refusal !== null) {
				this.logger.warn(
					{ accountId, symbol, side, quantity, reason: refusal.message },
					"entry refused",
				);
				return err(refusal);
			}

			const saved = await this.ledger.setDcaConfig(accountId, symbol, config.value);
			if (!saved.ok) return saved;
			const placed = await this.desk.submit({
				accountId,
				symbol,
				side: entryOrderSide(side),
				quantity,
				purpose: OrderPurpose.Entry,
				type: OrderType.Market,
			});
			if (!placed.ok) {
				await this.ledger.setLastError(accountId, symbol, placed.error.message);
				return placed;
			}
			this.logger.info(
				{ accountId, symbol, side, quantity, orderId: placed.value.orderId },
				"entry sent",
			);
			return ok({
				orderId: placed.value.orderId,
				quantity,
				position: this.ledger.currentPosition(accountId, symbol),
			});
		});
	}

	requestExit(
		accountId: AccountId,
		symbol: SymbolId,
		reason: string,
	): Promise<Result<ExitOutcome, TradingError>> {
		return this.loop.run(positionKey(accountId, symbol), () =>
			this.exits.requestExit(accountId, symbol, reason),
		);
	}

	/** Emergency flatten. Runs at once, ahead of anything queued for the position. */
	requestForceFlatten(
		accountId: AccountId,
		symbol: SymbolId,
		reason = "operator",
	): Promise<Result<KillSwitchReport, TradingError>> {
		return this.killSwitch.activate(accountId, symbol, reason);
	}

	async getStatus(accountId: AccountId, symbol: SymbolId): Promise<PositionStatus> {
		const position = this.ledger.currentPosition(accountId, symbol);
		const driftRecords = await this.reconciler.driftRecords(accountId, symbol);
		return {
			position,
			exitState: position.exitState,
			pnl: this.pnl.summarize(accountId, symbol),
			driftRecords,
			flattening: position.flattening,
			attention: position.attention,
			halted: position.halted,
			lastError: position.lastError,
		};
	}

	// ── Market data ────────────────────────────────────────────────

	/**
	 * Records a tick and queues a mark, exit check and DCA pass for every open
	 * position on it. A position with a tick task still queued gets no second
	 * one; the queued task picks up the latest price.
	 */
	onTick(symbol: SymbolId, price: Decimal, timestampMs?: number): void {
		const quote = this.prices.onTick(symbol, price, timestampMs);
		if (quote === null) return;
		for (const position of this.ledger.positions()) {
			if (position.symbol !== symbol || position.quantity === 0) continue;
			const { accountId } = position;
			const key = positionKey(accountId, symbol);
			const queued = this.pendingTicks.has(key);
			this.pendingTicks.set(key, quote.price);
			if (queued) continue;
			this.loop.enqueue(key, "tick", async () => {
				const latest = this.pendingTicks.get(key);
				this.pendingTicks.delete(key);
				if (latest !== undefined) await this.onPositionTick(accountId, symbol, latest);
			});
		}
	}

	setAtr(symbol: SymbolId, atr: Decimal | null): void {
		this.prices.setAtr(symbol, atr);
	}

	// ── Operator ───────────────────────────────────────────────────

	/** Re-derives the position from its stored fill log. A corrupt log halts the symbol. */
	rebuildPosition(accountId: AccountId, symbol: SymbolId): Promise<Result<Position, TradingError>> {
		return this.loop.run(positionKey(accountId, symbol), () =>
			this.ledger.rebuild(accountId, symbol),
		);
	}

	/** Lets automation resume after an operator has dealt with the position. */
	clearAttention(accountId: AccountId, symbol: SymbolId): Promise<Result<Position, TradingError>> {
		return this.loop.run(positionKey(accountId, symbol), async () => {
			const cleared = await this.ledger.setAttention(accountId, symbol, null);
			if (!cleared.ok) return cleared;
			this.logger.info({ accountId, symbol }, "attention cleared");
			return this.ledger.setLastError(accountId, symbol, null);
		});
	}

	/**
	 * Returns a halted or stuck position to IDLE: drops any exit in flight,
	 * clears the flags and books what the broker holds.
	 */
	resetSymbol(accountId: AccountId, symbol: SymbolId): Promise<Result<Position, TradingError>> {
		return this.loop.run(positionKey(accountId, symbol), async () => {
			this.exits.reset(accountId, symbol);
			if (this.ledger.currentPosition(accountId, symbol).exitState !== ExitState.Idle) {
				const reset = await this.ledger.transitionExit(
					accountId,
					symbol,
					ExitTrigger.OperatorReset,
					"operator",
				);
				if (!reset.ok) return reset;
			}
			await this.ledger.setFlattening(accountId, symbol, false);
			await this.ledger.setHalted(accountId, symbol, null);
			const cleared = await this.ledger.setAttention(accountId, symbol, null);
			if (!cleared.ok) return cleared;

			const outcome = await this.reconciler.reconcile(accountId, symbol, { force: true });
			if (outcome.kind === "failed") return err(outcome.error);
			this.logger.warn({ accountId, symbol, outcome: outcome.kind }, "symbol reset by operator");
			return ok(this.ledger.currentPosition(accountId, symbol));
		});
	}

	// ── Internals ──────────────────────────────────────────────────

	private async onPositionTick(
		accountId: AccountId,
		symbol: SymbolId,
		price: Decimal,
	): Promise<void> {
		const position = this.pnl.onPrice(accountId, symbol, price);
		this.checkLossLimit(accountId);
		if (position.exitState !== ExitState.Idle || position.flattening) return;
		if (position.halted !== null || position.attention !== null) return;

		const signal = this.conditions.evaluate(position, price, this.contracts.resolve(symbol));
		if (signal !== null) {
			this.logger.info(
				{ accountId, symbol, trigger: signal.type, level: signal.level.toString() },
				"exit condition met",
			);
			const exited = await this.exits.requestExit(accountId, symbol, signal.type);
			if (!exited.ok) {
				this.logger.error(
					{ accountId, symbol, error: exited.error.message },
					"triggered exit failed",
				);
			}
			return;
		}
		await this.dca.onTick(accountId, symbol, price);
	}

	private checkLossLimit(accountId: AccountId): void {
		// Not awaited: a breach flattens through the kill switch, outside the slot.
		this.lossLimit
			.check(accountId)
			.then((check) => {
				if (check.kind === "tripped") {
					this.logger.fatal(
						{ accountId, total: check.total.toString(), flattened: check.flattened },
						"account flattened by the daily loss limit",
					);
				}
			})
			.catch((e: unknown) => {
				this.logger.error({ accountId, error: String(e) }, "loss-limit check threw");
			});
	}

	/** Queues a reconcile for every known position. */
	private audit(): void {
		for (const position of this.ledger.positions()) {
			const { accountId, symbol } = position;
			if (!this.gateway.hasAccount(accountId)) continue;
			this.loop.enqueue(positionKey(accountId, symbol), "drift-audit", async () => {
				const outcome = await this.reconciler.reconcile(accountId, symbol);
				if (outcome.kind === "failed") {
					this.logger.warn(
						{ accountId, symbol, error: outcome.error.message },
						"drift audit failed",
					);
				}
			});
		}
	}

	private entryRefusal(
		position: Position,
		side: OpenSide,
		quantity: number,
		maxQuantity: number,
	): ConflictingIntentError | null {
		const context = { accountId: position.accountId, symbol: position.symbol, side, quantity };
		if (position.halted !== null) {
			return new ConflictingIntentError("Symbol is halted", context, "Reset the symbol first");
		}
		if (position.exitState !== ExitState.Idle || position.flattening) {
			return new ConflictingIntentError("An exit is in flight", {
				...context,
				exitState: position.exitState,
			});
		}
		if (position.attention !== null) {
			return new ConflictingIntentError(
				`Position needs attention: ${position.attention.code}`,
				context,
				"Clear the attention flag once the broker position is checked",
			);
		}
		if (this.lossLimit.isLocked(position.accountId)) {
			return new ConflictingIntentError("Daily loss limit reached for the account", context);
		}
		const held = position.side === PositionSide.Flat ? null : position.side;
		if (held !== null && held !== side) {
			return new ConflictingIntentError(
				`Position is ${held}; exit it before opening ${side}`,
				context,
			);
		}
		if (Math.abs(position.quantity) + quantity > maxQuantity) {
			return new ConflictingIntentError(
				`Entry would take the position past its max quantity of ${maxQuantity}`,
				{ ...context, current: position.quantity, maxQuantity },
			);
		}
		return null;
	}
}
