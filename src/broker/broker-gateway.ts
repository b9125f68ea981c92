/**
 * BrokerGateway — the one shared, concurrently used path to the broker.
 *
 * Every call first takes a token from the limiter of the account's session
 * (two accounts on one session share a bucket), then runs through the
 * CallPolicy: queries retry, orders are single-shot. Priority calls take
 * the next free token ahead of queued callers and are never retried.
 * Adapter exceptions come back as Result values.
 */

import { tokenFingerprint } from "../auth/session-token.js";
import { RateLimiterManager } from "../lib/http/rate-limiter-manager.js";
import type { RateLimiterStats, TokenBucketRateLimiter } from "../lib/http/rate-limiter.js";
import type { Logger } from "../lib/logger/index.js";
import { createSilentLogger } from "../lib/logger/index.js";
import type { QueryRetrySettings, RateLimitSettings } from "../shared/config.js";
import { DEFAULT_ENGINE_CONFIG } from "../shared/config.js";
import { ConfigError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import type { AccountId, OrderId, SymbolId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { CallKind, CallPolicy } from "./call-policy.js";
import { createOrderIntent } from "./types.js";
import type {
	BrokerAccount,
	BrokerApi,
	BrokerFill,
	BrokerPosition,
	OrderIntent,
	OrderRequest,
	PlacedOrder,
} from "./types.js";

export interface BrokerGatewayOptions {
	readonly rateLimit?: RateLimitSettings;
	readonly queryRetry?: QueryRetrySettings;
	/** Longest a call waits for a limiter token */
	readonly acquireTimeoutMs?: number;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export interface CallOptions {
	/** Ahead of the limiter queue, single-shot */
	readonly priority?: boolean;
}

interface AccountEntry {
	readonly account: BrokerAccount;
	readonly limiter: TokenBucketRateLimiter;
	readonly limiterKey: string;
}

export class BrokerGateway {
	private readonly accounts = new Map<string, AccountEntry>();
	private readonly limiters: RateLimiterManager;
	private readonly rateLimit: RateLimitSettings;
	private readonly policy: CallPolicy;
	private readonly acquireTimeoutMs: number;
	private readonly logger: Logger;

	constructor(options: BrokerGatewayOptions = {}) {
		this.logger = options.logger ?? createSilentLogger();
		this.limiters = new RateLimiterManager(options.clock ?? SystemClock);
		this.rateLimit = options.rateLimit ?? DEFAULT_ENGINE_CONFIG.rateLimit;
		const retry = options.queryRetry ?? DEFAULT_ENGINE_CONFIG.queryRetry;
		this.policy = new CallPolicy(retry, this.logger);
		this.acquireTimeoutMs = options.acquireTimeoutMs ?? 30_000;
	}

	/** Register (or replace) an account. Accounts sharing a session token share a limiter. */
	registerAccount(account: BrokerAccount): void {
		const limiterKey = tokenFingerprint(account.sessionToken);
		const limiter = this.limiters.getOrCreate(limiterKey, {
			capacity: this.rateLimit.capacity,
			refillRate: this.rateLimit.refillPerSecond,
		});
		this.accounts.set(account.accountId, { account, limiter, limiterKey });
		this.logger.info(
			{ accountId: account.accountId, environment: account.environment, limiter: limiterKey },
			"broker account registered",
		);
	}

	hasAccount(accountId: AccountId): boolean {
		return this.accounts.has(accountId);
	}

	accountIds(): readonly AccountId[] {
		return [...this.accounts.values()].map((e) => e.account.accountId);
	}

	/**
	 * Normalize and submit an order. Exit requests always go out as market
	 * orders. Never retried.
	 */
	async placeOrder(
		request: OrderRequest,
		options: CallOptions = {},
	): Promise<Result<PlacedOrder, TradingError>> {
		const intent = createOrderIntent(request);
		if (!intent.ok) return intent;
		const kind = options.priority === true ? CallKind.Priority : CallKind.Order;
		return this.call(intent.value.accountId, kind, "placeOrder", (api) =>
			api.placeOrder(intent.value),
		).then((result) => {
			this.logPlacement(intent.value, result);
			return result;
		});
	}

	async cancelOrder(
		accountId: AccountId,
		orderId: OrderId,
		options: CallOptions = {},
	): Promise<Result<void, TradingError>> {
		const kind = options.priority === true ? CallKind.Priority : CallKind.Order;
		return this.call(accountId, kind, "cancelOrder", (api) => api.cancelOrder(accountId, orderId));
	}

	async queryPosition(
		accountId: AccountId,
		symbol: SymbolId,
		options: CallOptions = {},
	): Promise<Result<BrokerPosition, TradingError>> {
		return this.call(accountId, queryKind(options), "queryPosition", (api) =>
			api.queryPosition(accountId, symbol),
		);
	}

	async queryOrders(
		accountId: AccountId,
		symbol: SymbolId,
		options: CallOptions = {},
	): Promise<Result<readonly OrderId[], TradingError>> {
		return this.call(accountId, queryKind(options), "queryOrders", (api) =>
			api.queryOrders(accountId, symbol),
		);
	}

	/** Broker fill history, or null when the adapter has none. */
	async queryFills(
		accountId: AccountId,
		symbol: SymbolId,
	): Promise<Result<readonly BrokerFill[] | null, TradingError>> {
		const entry = this.accounts.get(accountId);
		if (entry !== undefined && entry.account.api.queryFills === undefined) {
			return ok(null);
		}
		return this.call(accountId, CallKind.Query, "queryFills", async (api) =>
			api.queryFills === undefined ? null : api.queryFills(accountId, symbol),
		);
	}

	limiterStats(): ReadonlyMap<string, RateLimiterStats> {
		return this.limiters.getAllStats();
	}

	private async call<T>(
		accountId: AccountId,
		kind: CallKind,
		label: string,
		fn: (api: BrokerApi) => Promise<T>,
	): Promise<Result<T, TradingError>> {
		const entry = this.accounts.get(accountId);
		if (entry === undefined) {
			return err(new ConfigError(`Unknown broker account ${accountId}`, { accountId }));
		}
		return this.policy.run(kind, label, async () => {
			if (kind === CallKind.Priority) {
				await entry.limiter.acquirePriority(this.acquireTimeoutMs);
			} else {
				await entry.limiter.acquire(this.acquireTimeoutMs);
			}
			return fn(entry.account.api);
		});
	}

	private logPlacement(intent: OrderIntent, result: Result<PlacedOrder, TradingError>): void {
		const fields = {
			accountId: intent.accountId,
			symbol: intent.symbol,
			side: intent.side,
			quantity: intent.quantity,
			type: intent.type,
			purpose: intent.purpose,
		};
		if (result.ok) {
			this.logger.info({ ...fields, orderId: result.value.orderId }, "order placed");
		} else {
			this.logger.warn(
				{ ...fields, code: result.error.code, error: result.error.message },
				"order failed",
			);
		}
	}
}

function queryKind(options: CallOptions): CallKind {
	return options.priority === true ? CallKind.Priority : CallKind.Query;
}
