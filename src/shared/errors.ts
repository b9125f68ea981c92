/**
 * TradingError hierarchy — structured error classification.
 *
 * Every error carries a category (retryable, non-retryable, fatal). The broker
 * call policy retries only retryable errors on read-only queries; fatal errors
 * halt automation on the affected symbol until an operator resets it.
 */

/** Error severity categories that drive retry and halt behavior. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing TradingError subclasses with optional cause chain. */
interface TradingErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & TradingErrorOptions;

/** Base error class for every engine failure, with category-based retry semantics. */
export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

function splitCause(context: ErrorContext): {
	cause: unknown;
	rest: Record<string, unknown>;
} {
	const { cause, ...rest } = context;
	return { cause, rest };
}

// ── Broker / transport errors ────────────────────────────────────────

/** Retryable error for network connectivity failures. */
export class NetworkError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "NETWORK_ERROR", ErrorCategory.Retryable, rest);
		this.name = "NetworkError";
		if (cause !== undefined) this.cause = cause;
	}
}

/**
 * Deadline expiry. Retryable when a broker request timed out; the exit
 * confirmation loop and kill switch raise it as non-retryable (escalate, never loop).
 */
export class TimeoutError extends TradingError {
	readonly deadlineMs: number | undefined;

	constructor(
		message: string,
		context: ErrorContext & { readonly deadlineMs?: number } = {},
		category: ErrorCategory = ErrorCategory.Retryable,
	) {
		const { cause, rest } = splitCause(context);
		super(message, "TIMEOUT_ERROR", category, rest);
		this.name = "TimeoutError";
		this.deadlineMs = context.deadlineMs;
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable error for rate-limit (HTTP 429) responses; includes retry-after hint. */
export class RateLimitError extends TradingError {
	readonly retryAfterMs: number;
	constructor(message: string, retryAfterMs: number, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "RATE_LIMIT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "RateLimitError";
		this.retryAfterMs = retryAfterMs;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			retryAfterMs: this.retryAfterMs,
		};
	}
}

/** Non-retryable error for authentication/authorization failures. */
export class AuthError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "AUTH_ERROR", ErrorCategory.NonRetryable, rest);
		this.name = "AuthError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** The broker refused an order. Logged and surfaced, never retried silently. */
export class RejectError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "ORDER_REJECTED", ErrorCategory.NonRetryable, rest);
		this.name = "RejectError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Cancel or lookup of an order the broker does not know. */
export class NotFoundError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "ORDER_NOT_FOUND", ErrorCategory.NonRetryable, rest);
		this.name = "NotFoundError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Engine errors ────────────────────────────────────────────────────

/**
 * A local refusal before anything reaches the broker: growing a position
 * mid-exit, opening against an open position, exceeding max quantity,
 * or acting on a halted symbol.
 */
export class ConflictingIntentError extends TradingError {
	constructor(message: string, context: ErrorContext = {}, hint?: string) {
		const { cause, rest } = splitCause(context);
		super(message, "CONFLICTING_INTENT", ErrorCategory.NonRetryable, rest, hint);
		this.name = "ConflictingIntentError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Informational: virtual and broker quantities disagree. */
export class DriftDetectedError extends TradingError {
	readonly virtualQuantity: number;
	readonly brokerQuantity: number;

	constructor(
		message: string,
		virtualQuantity: number,
		brokerQuantity: number,
		context: ErrorContext = {},
	) {
		const { cause, rest } = splitCause(context);
		super(message, "DRIFT_DETECTED", ErrorCategory.NonRetryable, {
			...rest,
			virtualQuantity,
			brokerQuantity,
		});
		this.name = "DriftDetectedError";
		this.virtualQuantity = virtualQuantity;
		this.brokerQuantity = brokerQuantity;
		if (cause !== undefined) this.cause = cause;
	}
}

/** The fill log for a position cannot be replayed. */
export class LedgerCorruptionError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(
			message,
			"LEDGER_CORRUPTION",
			ErrorCategory.Fatal,
			rest,
			"Inspect the fill log, repair it, then reset the symbol",
		);
		this.name = "LedgerCorruptionError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

function statusOf(value: unknown): number | undefined {
	if (typeof value !== "object" || value === null) return undefined;
	if ("status" in value && typeof value.status === "number" && value.status >= 400) {
		return value.status;
	}
	if ("context" in value) return statusOf(value.context);
	return undefined;
}

/** Extract HTTP status from the error, its context, or one level of cause */
function getHttpStatus(error: Error): number | undefined {
	return statusOf(error) ?? statusOf(error.cause);
}

function errnoCode(error: Error): string | undefined {
	if ("code" in error && typeof error.code === "string") return error.code;
	return undefined;
}

/** Classify an unknown error thrown by a broker adapter into the TradingError hierarchy. */
export function classifyError(error: unknown): TradingError {
	if (error instanceof TradingError) return error;
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		const code = errnoCode(error);

		const httpStatus = getHttpStatus(error);
		if (httpStatus === 429 || code === "429") {
			return new RateLimitError(error.message, 1000, { cause: error });
		}
		if (httpStatus === 401 || httpStatus === 403) {
			return new AuthError(error.message, { cause: error });
		}
		if (httpStatus === 404) {
			return new NotFoundError(error.message, { cause: error });
		}
		if (httpStatus === 400 || httpStatus === 409 || httpStatus === 422) {
			return new RejectError(error.message, { cause: error, status: httpStatus });
		}
		if (httpStatus === 408) {
			return new TimeoutError(error.message, { cause: error });
		}
		if (httpStatus !== undefined && httpStatus >= 500) {
			return new NetworkError(error.message, { cause: error, status: httpStatus });
		}

		if (code === "ETIMEDOUT") {
			return new TimeoutError(error.message, { cause: error });
		}
		if (code === "ECONNREFUSED" || code === "ENOTFOUND" || code === "ECONNRESET") {
			return new NetworkError(error.message, { cause: error });
		}

		if (msg.includes("timeout") || msg.includes("timed out")) {
			return new TimeoutError(error.message, { cause: error });
		}
		if (msg.includes("econnrefused") || msg.includes("enotfound") || msg.includes("fetch failed")) {
			return new NetworkError(error.message, { cause: error });
		}
		if (msg.includes("rate limit") || msg.includes("429")) {
			return new RateLimitError(error.message, 1000, { cause: error });
		}
		if (msg.includes("rejected")) {
			return new RejectError(error.message, { cause: error });
		}
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

/** Normalize anything caught into an Error for logging and Result wrapping. */
export function toError(e: unknown): Error {
	return e instanceof Error ? e : new Error(String(e));
}

// ── Type guards ──────────────────────────────────────────────────────

export function isRejectError(e: unknown): e is RejectError {
	return e instanceof RejectError;
}

export function isConflictingIntent(e: unknown): e is ConflictingIntentError {
	return e instanceof ConflictingIntentError;
}

export function isTimeoutError(e: unknown): e is TimeoutError {
	return e instanceof TimeoutError;
}

export function isNotFoundError(e: unknown): e is NotFoundError {
	return e instanceof NotFoundError;
}
