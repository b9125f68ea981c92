/**
 * Engine configuration.
 *
 * Defaults are production values; `configFromEnv()` reads TICKLINE_* overrides
 * and `resolveEngineConfig()` validates the merged result.
 */

import { formatIssues, validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";

/** What to do when a market exit is rejected and the broker still shows a position. */
export const ExitRejectionPolicy = {
	/** Revert to IDLE and flag the position; automation pauses until cleared. */
	RequireOperator: "require_operator",
	/** Submit one more market exit; a second rejection falls back to RequireOperator. */
	RetryOnce: "retry_once",
	/** Hand the position to the kill switch. */
	EscalateKillSwitch: "escalate_kill_switch",
} as const;

export type ExitRejectionPolicy = (typeof ExitRejectionPolicy)[keyof typeof ExitRejectionPolicy];

export interface RateLimitSettings {
	/** Burst size per session token */
	readonly capacity: number;
	/** Tokens per second */
	readonly refillPerSecond: number;
}

export interface QueryRetrySettings {
	readonly maxAttempts: number;
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	readonly jitterFactor: number;
}

export interface EngineConfig {
	/** Broker position poll interval while confirming an exit */
	readonly confirmPollIntervalMs: number;
	/** Exit confirmation deadline; exceeding it escalates to the kill switch */
	readonly confirmTimeoutMs: number;
	/** Hard deadline from kill-switch activation to confirmed flat */
	readonly killSwitchDeadlineMs: number;
	readonly killSwitchPollIntervalMs: number;
	/** Periodic drift audit interval; 0 disables the timer */
	readonly reconcileIntervalMs: number;
	readonly exitRejectionPolicy: ExitRejectionPolicy;
	/** A take-profit closer than this many ticks to the last price is not placed */
	readonly takeProfitMinTicks: number;
	/** Per-account loss that force-flattens the account for the rest of the UTC day; null disables */
	readonly maxDailyLoss: number | null;
	readonly rateLimit: RateLimitSettings;
	readonly queryRetry: QueryRetrySettings;
	readonly logLevel: "trace" | "debug" | "info" | "warn" | "error" | "fatal";
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	confirmPollIntervalMs: 100,
	confirmTimeoutMs: 2_000,
	killSwitchDeadlineMs: 750,
	killSwitchPollIntervalMs: 50,
	reconcileIntervalMs: 2_000,
	exitRejectionPolicy: ExitRejectionPolicy.RequireOperator,
	takeProfitMinTicks: 2,
	maxDailyLoss: null,
	rateLimit: { capacity: 10, refillPerSecond: 5 },
	queryRetry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 2_000, jitterFactor: 0.1 },
	logLevel: "info",
};

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const engineConfigSchema = z
	.object({
		confirmPollIntervalMs: positiveInt,
		confirmTimeoutMs: positiveInt,
		killSwitchDeadlineMs: positiveInt,
		killSwitchPollIntervalMs: positiveInt,
		reconcileIntervalMs: nonNegativeInt,
		exitRejectionPolicy: z.enum(["require_operator", "retry_once", "escalate_kill_switch"]),
		takeProfitMinTicks: nonNegativeInt,
		maxDailyLoss: z.number().positive().nullable(),
		rateLimit: z.object({ capacity: positiveInt, refillPerSecond: z.number().nonnegative() }),
		queryRetry: z.object({
			maxAttempts: positiveInt,
			baseDelayMs: nonNegativeInt,
			maxDelayMs: nonNegativeInt,
			jitterFactor: z.number().min(0).max(1),
		}),
		logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]),
	})
	.refine((c) => c.confirmPollIntervalMs < c.confirmTimeoutMs, {
		message: "confirmPollIntervalMs must be shorter than confirmTimeoutMs",
		path: ["confirmPollIntervalMs"],
	})
	.refine((c) => c.killSwitchPollIntervalMs < c.killSwitchDeadlineMs, {
		message: "killSwitchPollIntervalMs must be shorter than killSwitchDeadlineMs",
		path: ["killSwitchPollIntervalMs"],
	});

/** Overrides accepted by the engine: top-level fields plus partial nested groups. */
export type EngineConfigOverrides = Partial<Omit<EngineConfig, "rateLimit" | "queryRetry">> & {
	readonly rateLimit?: Partial<RateLimitSettings>;
	readonly queryRetry?: Partial<QueryRetrySettings>;
};

/**
 * Merge overrides onto the defaults and validate.
 * @throws ConfigError listing every invalid field
 */
export function resolveEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
	const merged = {
		...DEFAULT_ENGINE_CONFIG,
		...overrides,
		rateLimit: { ...DEFAULT_ENGINE_CONFIG.rateLimit, ...overrides.rateLimit },
		queryRetry: { ...DEFAULT_ENGINE_CONFIG.queryRetry, ...overrides.queryRetry },
	};
	const result = validate(engineConfigSchema, merged);
	if (!result.ok) {
		const details = formatIssues(result.error.issues);
		throw new ConfigError(`Invalid engine config: ${details.join("; ")}`, { issues: details });
	}
	return result.value;
}

// ── Environment ──────────────────────────────────────────────────────

/** Mutable builder shape for the env reader. */
interface MutableOverrides {
	confirmPollIntervalMs?: number;
	confirmTimeoutMs?: number;
	killSwitchDeadlineMs?: number;
	killSwitchPollIntervalMs?: number;
	reconcileIntervalMs?: number;
	takeProfitMinTicks?: number;
	maxDailyLoss?: number | null;
	exitRejectionPolicy?: ExitRejectionPolicy;
	logLevel?: EngineConfig["logLevel"];
	rateLimit?: Partial<RateLimitSettings>;
}

type IntKey =
	| "confirmPollIntervalMs"
	| "confirmTimeoutMs"
	| "killSwitchDeadlineMs"
	| "killSwitchPollIntervalMs"
	| "reconcileIntervalMs"
	| "takeProfitMinTicks";

const INT_ENV: ReadonlyArray<readonly [string, IntKey, "positive" | "non_negative"]> = [
	["TICKLINE_CONFIRM_POLL_INTERVAL_MS", "confirmPollIntervalMs", "positive"],
	["TICKLINE_CONFIRM_TIMEOUT_MS", "confirmTimeoutMs", "positive"],
	["TICKLINE_KILL_SWITCH_DEADLINE_MS", "killSwitchDeadlineMs", "positive"],
	["TICKLINE_KILL_SWITCH_POLL_INTERVAL_MS", "killSwitchPollIntervalMs", "positive"],
	["TICKLINE_RECONCILE_INTERVAL_MS", "reconcileIntervalMs", "non_negative"],
	["TICKLINE_TAKE_PROFIT_MIN_TICKS", "takeProfitMinTicks", "non_negative"],
];

const POLICIES: readonly ExitRejectionPolicy[] = Object.values(ExitRejectionPolicy);
const LOG_LEVELS: ReadonlyArray<EngineConfig["logLevel"]> = [
	"trace",
	"debug",
	"info",
	"warn",
	"error",
	"fatal",
];

function isPolicy(value: string): value is ExitRejectionPolicy {
	return POLICIES.some((p) => p === value);
}

function isLogLevel(value: string): value is EngineConfig["logLevel"] {
	return LOG_LEVELS.some((l) => l === value);
}

/**
 * Reads engine overrides from environment variables.
 * Supported: TICKLINE_CONFIRM_POLL_INTERVAL_MS, TICKLINE_CONFIRM_TIMEOUT_MS,
 * TICKLINE_KILL_SWITCH_DEADLINE_MS, TICKLINE_KILL_SWITCH_POLL_INTERVAL_MS,
 * TICKLINE_RECONCILE_INTERVAL_MS, TICKLINE_TAKE_PROFIT_MIN_TICKS,
 * TICKLINE_MAX_DAILY_LOSS, TICKLINE_EXIT_REJECTION_POLICY, TICKLINE_LOG_LEVEL,
 * TICKLINE_RATE_LIMIT_CAPACITY, TICKLINE_RATE_LIMIT_REFILL_PER_SECOND.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfigOverrides {
	const result: MutableOverrides = {};

	for (const [envKey, configKey, kind] of INT_ENV) {
		const parsed = parseIntEnv(env, envKey, kind);
		if (parsed !== undefined) result[configKey] = parsed;
	}

	const maxLoss = env["TICKLINE_MAX_DAILY_LOSS"];
	if (maxLoss !== undefined && maxLoss.length > 0) {
		const n = Number(maxLoss);
		if (!Number.isFinite(n) || n <= 0) {
			throw new ConfigError(
				`Invalid TICKLINE_MAX_DAILY_LOSS: "${maxLoss}" must be a positive number`,
			);
		}
		result.maxDailyLoss = n;
	}

	const policy = env["TICKLINE_EXIT_REJECTION_POLICY"];
	if (policy !== undefined && policy.length > 0) {
		if (!isPolicy(policy)) {
			throw new ConfigError(
				`Invalid TICKLINE_EXIT_REJECTION_POLICY: "${policy}" must be one of ${POLICIES.join(", ")}`,
			);
		}
		result.exitRejectionPolicy = policy;
	}

	const level = env["TICKLINE_LOG_LEVEL"];
	if (level !== undefined && level.length > 0) {
		if (!isLogLevel(level)) {
			throw new ConfigError(`Invalid TICKLINE_LOG_LEVEL: "${level}"`);
		}
		result.logLevel = level;
	}

	const capacity = parseIntEnv(env, "TICKLINE_RATE_LIMIT_CAPACITY", "positive");
	const refill = parseIntEnv(env, "TICKLINE_RATE_LIMIT_REFILL_PER_SECOND", "non_negative");
	if (capacity !== undefined || refill !== undefined) {
		result.rateLimit = {
			...(capacity !== undefined && { capacity }),
			...(refill !== undefined && { refillPerSecond: refill }),
		};
	}

	return result;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseIntEnv(
	env: NodeJS.ProcessEnv,
	envKey: string,
	kind: "positive" | "non_negative",
): number | undefined {
	const raw = env[envKey];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	const valid = kind === "positive" ? parsed > 0 : parsed >= 0;
	if (Number.isNaN(parsed) || !valid) {
		const expected = kind === "positive" ? "a positive integer" : "a non-negative integer";
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be ${expected}`);
	}
	return parsed;
}
