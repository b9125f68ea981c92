/**
 * AlertDispatcher — typed pub/sub for engine alerts.
 *
 * Synchronous dispatch, handlers called in registration order. A throwing
 * handler is reported to the error callback and the rest still run.
 */

import type { EngineAlert, EngineAlertType } from "./alerts.js";

type AlertHandler = (alert: EngineAlert) => void;

/** Optional callback invoked when a handler throws during dispatch. */
export type HandlerErrorCallback = (error: unknown) => void;

export class AlertDispatcher {
	private readonly handlers = new Map<EngineAlertType | "*", AlertHandler[]>();
	private readonly onHandlerError: HandlerErrorCallback | null;
	private readonly recent: EngineAlert[] = [];
	private readonly maxRecent: number;

	constructor(onHandlerError?: HandlerErrorCallback, maxRecent = 100) {
		this.onHandlerError = onHandlerError ?? null;
		this.maxRecent = maxRecent;
	}

	/** Subscribe to one alert type, or "*" for all */
	on(type: EngineAlertType | "*", handler: AlertHandler): () => void {
		const handlers = this.handlers.get(type) ?? [];
		handlers.push(handler);
		this.handlers.set(type, handlers);

		return () => {
			const list = this.handlers.get(type);
			if (list) {
				const idx = list.indexOf(handler);
				if (idx !== -1) list.splice(idx, 1);
			}
		};
	}

	emit(alert: EngineAlert): void {
		this.recent.push(alert);
		if (this.recent.length > this.maxRecent) this.recent.shift();
		this.dispatchAll(this.handlers.get(alert.type), alert);
		this.dispatchAll(this.handlers.get("*"), alert);
	}

	/** Most recent alerts, oldest first */
	history(): readonly EngineAlert[] {
		return [...this.recent];
	}

	clear(): void {
		this.handlers.clear();
	}

	private dispatchAll(handlers: AlertHandler[] | undefined, alert: EngineAlert): void {
		if (!handlers) return;
		for (const handler of [...handlers]) {
			try {
				handler(alert);
			} catch (error: unknown) {
				try {
					this.onHandlerError?.(error);
				} catch {
					// a throwing error callback is ignored; later sinks still run
				}
			}
		}
	}
}
