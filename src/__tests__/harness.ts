/**
 * Shared wiring for component tests: a paper broker behind the gateway,
 * an in-memory ledger and a price feed, all in process.
 */

import { SessionToken } from "../auth/session-token.js";
import { BrokerGateway } from "../broker/broker-gateway.js";
import { OrderDesk } from "../broker/order-desk.js";
import { OrderRegistry } from "../broker/order-registry.js";
import { PaperBroker } from "../broker/paper-broker.js";
import type { BrokerApi, BrokerEvent, BrokerEventHandler } from "../broker/types.js";
import { parseDcaConfig } from "../dca/types.js";
import type { DcaConfigInput } from "../dca/types.js";
import { SymbolLoop } from "../engine/symbol-loop.js";
import { TradingEngine } from "../engine/trading-engine.js";
import { AlertDispatcher } from "../events/alert-dispatcher.js";
import type { EngineAlert } from "../events/alerts.js";
import { ConfirmationLoop } from "../exit/confirmation-loop.js";
import { ExitEpochs } from "../exit/exit-epoch.js";
import { ExitMachine } from "../exit/exit-machine.js";
import { KillSwitch } from "../exit/kill-switch.js";
import { MemoryLedgerStore } from "../ledger/memory-store.js";
import { PositionLedger } from "../ledger/position-ledger.js";
import type { Fill, FillRole } from "../ledger/types.js";
import { createSilentLogger } from "../lib/logger/index.js";
import { PriceFeed } from "../market/price-feed.js";
import { DriftReconciler } from "../reconcile/drift-reconciler.js";
import { ExitRejectionPolicy } from "../shared/config.js";
import type { EngineConfigOverrides, RateLimitSettings } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { accountId, fillId, orderId, positionKey, symbolId } from "../shared/identifiers.js";
import type { AccountId, SymbolId } from "../shared/identifiers.js";
import { OrderSide } from "../shared/side.js";
import { sleep } from "../shared/time.js";

export const ACCT = accountId("acct-1");
/** Micro Dow: one-point ticks, so tick distances read as prices */
export const MYM = symbolId("MYMZ5");

export const FAST_QUERIES = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitterFactor: 0 };
export const OPEN_LIMITER = { capacity: 1_000, refillPerSecond: 1_000 };

export function createHarness(
	store = new MemoryLedgerStore(),
	rateLimit: RateLimitSettings = OPEN_LIMITER,
	broker = new PaperBroker(),
) {
	const gateway = new BrokerGateway({ queryRetry: FAST_QUERIES, rateLimit });
	gateway.registerAccount({
		accountId: ACCT,
		sessionToken: SessionToken.seal("test-secret"),
		environment: "simulated",
		api: broker,
	});
	const registry = new OrderRegistry();
	const desk = new OrderDesk(gateway, registry);
	const ledger = new PositionLedger({ store });
	const prices = new PriceFeed();
	const alerts = new AlertDispatcher();
	const raised: EngineAlert[] = [];
	alerts.on("*", (a) => raised.push(a));
	return { broker, gateway, registry, desk, ledger, store, prices, alerts, raised };
}

export type Harness = ReturnType<typeof createHarness>;

export interface ExitTimings {
	readonly policy: ExitRejectionPolicy;
	readonly confirmPollIntervalMs: number;
	readonly confirmTimeoutMs: number;
	readonly killSwitchDeadlineMs: number;
	readonly killSwitchPollIntervalMs: number;
}

/** Short real-timer settings so confirmation and flatten finish inside a test. */
export const FAST_EXIT: ExitTimings = {
	policy: ExitRejectionPolicy.RequireOperator,
	confirmPollIntervalMs: 5,
	confirmTimeoutMs: 500,
	killSwitchDeadlineMs: 200,
	killSwitchPollIntervalMs: 5,
};

/** Exit machine, kill switch and confirmation loop over a harness. */
export function wireExit(h: Harness, timings: Partial<ExitTimings> = {}) {
	const t = { ...FAST_EXIT, ...timings };
	const loop = new SymbolLoop();
	const epochs = new ExitEpochs();
	const reconciler = new DriftReconciler({
		ledger: h.ledger,
		gateway: h.gateway,
		store: h.store,
		prices: h.prices,
		alerts: h.alerts,
		registry: h.registry,
	});
	const killSwitch = new KillSwitch({
		ledger: h.ledger,
		desk: h.desk,
		gateway: h.gateway,
		alerts: h.alerts,
		epochs,
		corrector: reconciler,
		schedule: loop.schedule,
		deadlineMs: t.killSwitchDeadlineMs,
		pollIntervalMs: t.killSwitchPollIntervalMs,
	});
	const confirmation = new ConfirmationLoop({
		ledger: h.ledger,
		gateway: h.gateway,
		corrector: reconciler,
		flattener: killSwitch,
		alerts: h.alerts,
		epochs,
		schedule: loop.schedule,
		pollIntervalMs: t.confirmPollIntervalMs,
		timeoutMs: t.confirmTimeoutMs,
	});
	const machine = new ExitMachine({
		ledger: h.ledger,
		desk: h.desk,
		gateway: h.gateway,
		corrector: reconciler,
		flattener: killSwitch,
		confirmation,
		alerts: h.alerts,
		epochs,
		policy: t.policy,
	});
	const key = positionKey(ACCT, MYM);
	/** Runs an exit request in the position's slot, as the engine does. */
	const requestExit = (reason = "manual") =>
		loop.run(key, () => machine.requestExit(ACCT, MYM, reason));
	return { loop, epochs, reconciler, killSwitch, confirmation, machine, key, requestExit };
}

export type ExitRig = ReturnType<typeof wireExit>;

/** A long or short of `quantity` held at both the broker and the ledger. */
export async function holdPosition(h: Harness, quantity: number, price: string): Promise<void> {
	quote(h, price);
	const side = quantity > 0 ? OrderSide.Buy : OrderSide.Sell;
	const booked = await h.ledger.recordFill(makeFill(side, Math.abs(quantity), price));
	if (!booked.ok) throw booked.error;
	h.broker.setPosition(ACCT, MYM, quantity, Decimal.from(price));
}

let seq = 0;

export function makeFill(
	side: OrderSide,
	quantity: number,
	price: string,
	role: FillRole = "entry",
	where: { accountId?: AccountId; symbol?: SymbolId } = {},
): Fill {
	seq++;
	return {
		fillId: fillId(`hf-${seq}`),
		orderId: orderId(`ho-${seq}`),
		accountId: where.accountId ?? ACCT,
		symbol: where.symbol ?? MYM,
		side,
		quantity,
		price: Decimal.from(price),
		timestampMs: seq,
		role,
	};
}

export function dcaConfig(input: DcaConfigInput) {
	const parsed = parseDcaConfig(input);
	if (!parsed.ok) throw parsed.error;
	return parsed.value;
}

/** Sets the broker and feed price together. */
export function quote(h: Harness, price: string, symbol: SymbolId = MYM): Decimal {
	const p = Decimal.from(price);
	h.broker.setPrice(symbol, p);
	h.prices.onTick(symbol, p);
	return p;
}

/** Lets paper-broker events scheduled with setTimeout(0) run. */
export async function settle(ms = 5): Promise<void> {
	await sleep(ms);
}

/**
 * A full engine over a paper broker, timers shortened for tests. `api`
 * fronts the broker for calls; events always come from the broker itself.
 */
export function createEngineRig(
	config: EngineConfigOverrides = {},
	store = new MemoryLedgerStore(),
	broker = new PaperBroker(),
	api: BrokerApi = broker,
) {
	let deliver: BrokerEventHandler = () => undefined;
	const engine = new TradingEngine({
		store,
		logger: createSilentLogger(),
		config: {
			confirmPollIntervalMs: FAST_EXIT.confirmPollIntervalMs,
			confirmTimeoutMs: FAST_EXIT.confirmTimeoutMs,
			killSwitchDeadlineMs: FAST_EXIT.killSwitchDeadlineMs,
			killSwitchPollIntervalMs: FAST_EXIT.killSwitchPollIntervalMs,
			reconcileIntervalMs: 0,
			queryRetry: FAST_QUERIES,
			rateLimit: OPEN_LIMITER,
			...config,
		},
	});
	engine.registerAccount(
		{
			accountId: ACCT,
			sessionToken: SessionToken.seal("test-secret"),
			environment: "simulated",
			api,
		},
		(handler) => {
			deliver = handler;
			return broker.subscribe(handler);
		},
	);
	const raised: EngineAlert[] = [];
	engine.alerts.on("*", (a) => raised.push(a));
	/** Moves the broker market and feeds the same tick to the engine. */
	const tick = (price: string): void => {
		const p = Decimal.from(price);
		broker.setPrice(MYM, p);
		engine.onTick(MYM, p);
	};
	const position = () => engine.ledger.currentPosition(ACCT, MYM);
	/** Hands an event to the engine as if the broker had pushed it again. */
	const redeliver = (event: BrokerEvent): void => deliver(event);
	return { broker, engine, store, raised, tick, position, redeliver };
}

export type EngineRig = ReturnType<typeof createEngineRig>;
