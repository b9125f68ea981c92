/**
 * BrokerStream — the broker's push channel as a stream of BrokerEvents.
 *
 * On every (re)connect it authorizes with the session token and requests a
 * user sync; it answers server heartbeats, decodes entity frames and
 * re-emits them as `event`. A dropped connection is retried with
 * exponential backoff until `stop()`.
 */

import { revealSessionToken } from "../auth/session-token.js";
import type { SessionToken } from "../auth/session-token.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { createSilentLogger } from "../lib/logger/index.js";
import { ReconnectionPolicy } from "../lib/websocket/reconnection.js";
import type { ReconnectionConfig } from "../lib/websocket/reconnection.js";
import type { WsClientLike } from "../lib/websocket/types.js";
import { AuthError, NetworkError, classifyError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { HEARTBEAT_FRAME, decodeFrame, encodeAuthorize, encodeSyncRequest } from "./frame-codec.js";
import type { BrokerResponse } from "./frame-codec.js";
import type { BrokerEvent } from "./types.js";

export type BrokerStreamEvents = {
	event: (event: BrokerEvent) => void;
	/** Authorized and synced */
	ready: () => void;
	disconnected: (code: number, reason: string) => void;
	error: (error: TradingError) => void;
};

export interface BrokerStreamOptions {
	readonly client: WsClientLike;
	readonly sessionToken: SessionToken;
	/** Users to sync; empty syncs the token's own user */
	readonly userIds?: readonly number[];
	readonly reconnection?: ReconnectionConfig;
	readonly logger?: Logger;
}

export class BrokerStream extends TypedEmitter<BrokerStreamEvents> {
	private readonly client: WsClientLike;
	private readonly token: SessionToken;
	private readonly userIds: readonly number[];
	private readonly policy: ReconnectionPolicy;
	private readonly logger: Logger;
	private running = false;
	private requestId = 0;
	private authRequestId = -1;
	private authorized = false;
	private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
	private _generation = 0;

	constructor(options: BrokerStreamOptions) {
		super();
		this.client = options.client;
		this.token = options.sessionToken;
		this.userIds = options.userIds ?? [];
		this.policy = new ReconnectionPolicy(options.reconnection);
		this.logger = options.logger ?? createSilentLogger();

		this.client.onOpen(() => this.handshake());
		this.client.onMessage((data) => this.handleFrame(data));
		this.client.onClose((code, reason) => this.handleClose(code, reason));
		this.client.onError((error) => {
			this.logger.warn({ error: error.message }, "broker stream socket error");
		});
	}

	/** Connections made so far; bumps on every reconnect. */
	get generation(): number {
		return this._generation;
	}

	get isAuthorized(): boolean {
		return this.authorized;
	}

	/**
	 * Open the stream. A failed first connect still schedules retries;
	 * the error is returned so the caller can log it.
	 */
	async start(): Promise<Result<void, TradingError>> {
		this.running = true;
		try {
			await this.client.connect();
			return ok(undefined);
		} catch (e) {
			const error = classifyError(e);
			this.logger.warn({ error: error.message }, "broker stream connect failed");
			this.scheduleReconnect();
			return err(error);
		}
	}

	stop(): void {
		this.running = false;
		if (this.reconnectTimer !== null) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
		this.client.close();
	}

	private handshake(): void {
		this._generation++;
		this.authorized = false;
		this.authRequestId = this.nextRequestId();
		const authorize = encodeAuthorize(this.authRequestId, revealSessionToken(this.token));
		const auth = this.client.send(authorize);
		if (!auth.ok) {
			this.emit("error", auth.error);
			return;
		}
		const sync = this.client.send(encodeSyncRequest(this.nextRequestId(), this.userIds));
		if (!sync.ok) {
			this.emit("error", sync.error);
		}
	}

	private handleFrame(raw: string): void {
		const decoded = decodeFrame(raw);
		if (!decoded.ok) {
			this.logger.warn(
				{ error: decoded.error.message, issues: decoded.error.context },
				"bad broker frame",
			);
			return;
		}
		const frame = decoded.value;
		switch (frame.kind) {
			case "open":
				return;
			case "heartbeat": {
				const sent = this.client.send(HEARTBEAT_FRAME);
				if (!sent.ok) this.logger.warn({ error: sent.error.message }, "heartbeat reply failed");
				return;
			}
			case "close":
				this.logger.info({ code: frame.code, reason: frame.reason }, "broker closed the stream");
				return;
			case "messages":
				for (const response of frame.responses) {
					this.handleResponse(response);
				}
				for (const event of frame.events) {
					this.emit("event", event);
				}
				if (frame.skipped > 0) {
					this.logger.debug({ skipped: frame.skipped }, "skipped broker items");
				}
				return;
		}
	}

	private handleResponse(response: BrokerResponse): void {
		if (response.requestId !== this.authRequestId) return;
		if (response.status === 200) {
			this.authorized = true;
			this.policy.reset();
			this.logger.info({ generation: this._generation }, "broker stream authorized");
			this.emit("ready");
			return;
		}
		this.emit(
			"error",
			new AuthError("Broker stream authorization failed", { status: response.status }),
		);
		this.stop();
	}

	private handleClose(code: number, reason: string): void {
		this.authorized = false;
		this.emit("disconnected", code, reason);
		if (this.running) {
			this.logger.warn({ code, reason }, "broker stream closed, reconnecting");
			this.scheduleReconnect();
		}
	}

	private scheduleReconnect(): void {
		if (!this.running || this.reconnectTimer !== null) return;
		if (!this.policy.shouldRetry()) {
			this.running = false;
			this.emit(
				"error",
				new NetworkError("Broker stream reconnect attempts exhausted", {
					attempts: this.policy.attemptCount,
				}),
			);
			return;
		}
		const delay = this.policy.nextDelay();
		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			if (!this.running) return;
			this.client.connect().catch((e: unknown) => {
				this.logger.warn({ error: classifyError(e).message }, "broker stream reconnect failed");
				this.scheduleReconnect();
			});
		}, delay);
	}

	private nextRequestId(): number {
		const id = this.requestId;
		this.requestId++;
		return id;
	}
}
