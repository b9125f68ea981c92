import type { TradingError } from "../../shared/errors.js";
import type { Result } from "../../shared/result.js";

/**
 * Configuration for WebSocket client.
 */
export interface WsConfig {
	/** WebSocket server URL (ws:// or wss://) */
	readonly url: string;
	/**
	 * Terminate the socket when no frame (heartbeats included) has arrived
	 * for this long. The close handlers then see code 1006. 0 disables.
	 */
	readonly idleTimeoutMs: number;
	/** Extra HTTP headers sent with the upgrade request. */
	readonly headers?: Readonly<Record<string, string>>;
}

/**
 * WebSocket connection lifecycle state.
 * - `connecting`: Connection in progress
 * - `open`: Connected and ready
 * - `closing`: Close initiated
 * - `closed`: Connection terminated
 */
export type WsState = "connecting" | "open" | "closing" | "closed";

export type WsOpenHandler = () => void;
export type WsMessageHandler = (data: string) => void;
export type WsCloseHandler = (code: number, reason: string) => void;
export type WsErrorHandler = (error: Error) => void;

/**
 * Minimal client surface consumed by stream adapters.
 * Allows injection of stubs for testing.
 */
export interface WsClientLike {
	connect(): Promise<void>;
	send(data: string): Result<void, TradingError>;
	close(): void;
	getState(): WsState;
	onOpen(handler: WsOpenHandler): void;
	onMessage(handler: WsMessageHandler): void;
	onClose(handler: WsCloseHandler): void;
	onError(handler: WsErrorHandler): void;
}
