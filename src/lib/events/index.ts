import { EventEmitter } from "eventemitter3";

/**
 * Event map -- keys are event names, values are handler signatures.
 * Example: { positionChanged: (p: Position) => void; alert: (a: Alert) => void }
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

/**
 * Type-safe event emitter over eventemitter3.
 *
 * Handlers run synchronously inside `emit`; a throwing handler propagates
 * to the emitter, so components keep handlers small and non-throwing.
 *
 * @example
 * ```ts
 * type Events = { tick: (symbol: SymbolId, price: Decimal) => void };
 * const emitter = new TypedEmitter<Events>();
 * const off = emitter.listen("tick", (s, p) => log(s, p));
 * emitter.emit("tick", sym, Decimal.from("4512.25"));
 * off();
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler);
		return this;
	}

	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler);
		return this;
	}

	/** Registers a handler and returns the function that removes it. */
	listen<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): () => void {
		this.ee.on(event, handler);
		return () => {
			this.ee.off(event, handler);
		};
	}

	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	/** Removes all listeners for one event, or for every event when none is given. */
	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
		} else {
			this.ee.removeAllListeners();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}
