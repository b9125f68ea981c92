/**
 * Opaque broker session token — the secret never leaks through toString,
 * JSON.stringify, or Node.js inspect.
 */

import { createHash } from "node:crypto";
import { inspect } from "node:util";
import { AuthError } from "../shared/errors.js";

// ── Private store ────────────────────────────────────────────────────

const store = new WeakMap<SessionToken, string>();

// ── Token ────────────────────────────────────────────────────────────

export class SessionToken {
	readonly __opaque = true as const;

	private constructor() {}

	/**
	 * Seals a raw access token.
	 * @example
	 * const token = SessionToken.seal("test-secret");
	 * console.log(token); // [REDACTED]
	 */
	static seal(raw: string): SessionToken {
		if (raw.trim().length === 0) {
			throw new AuthError("Session token cannot be empty");
		}
		const token = new SessionToken();
		store.set(token, raw);
		return token;
	}

	toString(): string {
		return "[REDACTED]";
	}

	toJSON(): string {
		return "[REDACTED]";
	}

	[inspect.custom](): string {
		return "[REDACTED]";
	}
}

// ── Accessors ────────────────────────────────────────────────────────

/** The raw token, for the broker adapter's authorize frame only. */
export function revealSessionToken(token: SessionToken): string {
	const raw = store.get(token);
	if (raw === undefined) {
		throw new AuthError("Invalid session token");
	}
	return raw;
}

/**
 * Stable, non-reversible key for a token. Accounts that share a session
 * share a fingerprint, and therefore a rate limiter.
 */
export function tokenFingerprint(token: SessionToken): string {
	return createHash("sha256").update(revealSessionToken(token)).digest("hex").slice(0, 16);
}
