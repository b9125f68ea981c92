import WebSocket from "ws";
import { NetworkError } from "../../shared/errors.js";
import type { TradingError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import type {
	WsClientLike,
	WsCloseHandler,
	WsConfig,
	WsErrorHandler,
	WsMessageHandler,
	WsOpenHandler,
	WsState,
} from "./types.js";

interface HandlerLists {
	readonly open: WsOpenHandler[];
	readonly message: WsMessageHandler[];
	readonly close: WsCloseHandler[];
	readonly error: WsErrorHandler[];
}

/**
 * Text-frame WebSocket client over `ws`.
 *
 * Broker feeds send their own heartbeat frames, so liveness is judged by
 * inbound traffic: a connection silent for `idleTimeoutMs` is terminated
 * and reported through the close handlers like any other drop. Handlers
 * outlive a close; `connect()` again to reconnect.
 */
export class WsClient implements WsClientLike {
	private readonly config: WsConfig;
	private ws: WebSocket | null = null;
	private state: WsState = "closed";
	private readonly handlers: HandlerLists = { open: [], message: [], close: [], error: [] };
	private idleTimer: ReturnType<typeof setTimeout> | null = null;
	private _framesReceived = 0;

	constructor(config: WsConfig) {
		this.config = config;
	}

	/** Frames received over the life of this client, across reconnects. */
	get framesReceived(): number {
		return this._framesReceived;
	}

	/** Rejects with a NetworkError if the socket is not closed or the handshake fails. */
	connect(): Promise<void> {
		if (this.state !== "closed") {
			return Promise.reject(new NetworkError("WebSocket is already connecting or open"));
		}
		this.state = "connecting";
		const socket = new WebSocket(this.config.url, { headers: { ...this.config.headers } });
		this.ws = socket;

		return new Promise<void>((resolve, reject) => {
			let opened = false;
			socket.on("open", () => {
				opened = true;
				this.state = "open";
				this.armIdleTimer();
				for (const handler of this.handlers.open) handler();
				resolve();
			});

			socket.on("message", (data, isBinary) => {
				if (isBinary) return;
				this._framesReceived++;
				this.armIdleTimer();
				const text = data.toString();
				for (const handler of this.handlers.message) handler(text);
			});

			socket.on("close", (code, reason) => {
				this.state = "closed";
				this.ws = null;
				this.disarmIdleTimer();
				for (const handler of this.handlers.close) handler(code, reason.toString());
				if (!opened) reject(new NetworkError("WebSocket closed before it opened", { code }));
			});

			socket.on("error", (error) => {
				for (const handler of this.handlers.error) handler(error);
				if (!opened) {
					reject(new NetworkError("WebSocket connection failed", { cause: error.message }));
				}
			});
		});
	}

	send(data: string): Result<void, TradingError> {
		if (this.state !== "open" || this.ws === null) {
			return err(new NetworkError("WebSocket is not connected"));
		}
		try {
			this.ws.send(data);
			return ok(undefined);
		} catch (error) {
			return err(
				new NetworkError("WebSocket send failed", {
					cause: error instanceof Error ? error.message : String(error),
				}),
			);
		}
	}

	/** Starts the closing handshake; close handlers fire once it completes. */
	close(): void {
		if (this.ws === null || this.state === "closing") return;
		this.state = "closing";
		this.disarmIdleTimer();
		this.ws.close();
	}

	getState(): WsState {
		return this.state;
	}

	/** Runs after every successful (re)connect, before `connect()` resolves. */
	onOpen(handler: WsOpenHandler): void {
		this.handlers.open.push(handler);
	}

	/** Text frames only; binary frames are dropped. */
	onMessage(handler: WsMessageHandler): void {
		this.handlers.message.push(handler);
	}

	onClose(handler: WsCloseHandler): void {
		this.handlers.close.push(handler);
	}

	onError(handler: WsErrorHandler): void {
		this.handlers.error.push(handler);
	}

	clearHandlers(): void {
		this.handlers.open.length = 0;
		this.handlers.message.length = 0;
		this.handlers.close.length = 0;
		this.handlers.error.length = 0;
	}

	private armIdleTimer(): void {
		this.disarmIdleTimer();
		if (this.config.idleTimeoutMs <= 0) return;
		this.idleTimer = setTimeout(() => {
			this.idleTimer = null;
			this.ws?.terminate();
		}, this.config.idleTimeoutMs);
	}

	private disarmIdleTimer(): void {
		if (this.idleTimer !== null) {
			clearTimeout(this.idleTimer);
			this.idleTimer = null;
		}
	}
}
