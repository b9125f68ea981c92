/**
 * SymbolLoop — one serialized consumer per (account, symbol).
 *
 * Each key owns a promise chain: tasks for the same key run one at a time,
 * in enqueue order; different keys run concurrently. A task must not await
 * another task of its own key (it would wait on itself).
 */

import type { Logger } from "../lib/logger/index.js";
import { createSilentLogger } from "../lib/logger/index.js";
import { classifyError } from "../shared/errors.js";
import type { PositionKey } from "../shared/identifiers.js";

/** Fire-and-forget scheduling into a key's slot. */
export type Scheduler = (key: PositionKey, label: string, task: () => Promise<void>) => void;

interface Slot {
	tail: Promise<void>;
	pending: number;
}

export class SymbolLoop {
	private readonly slots = new Map<PositionKey, Slot>();
	private readonly logger: Logger;
	private closed = false;

	constructor(logger?: Logger) {
		this.logger = (logger ?? createSilentLogger()).child({ component: "symbol-loop" });
	}

	/** Runs `task` in the key's slot and resolves with its result. */
	run<T>(key: PositionKey, task: () => Promise<T>): Promise<T> {
		const slot = this.slotFor(key);
		slot.pending++;
		const result = slot.tail.then(task);
		slot.tail = result.then(
			() => this.release(key, slot),
			() => this.release(key, slot),
		);
		return result;
	}

	/**
	 * Schedules `task` without waiting. A failure is logged, never rethrown.
	 * Ignored once the loop is closed.
	 */
	enqueue(key: PositionKey, label: string, task: () => Promise<void>): void {
		if (this.closed) {
			this.logger.debug({ key, task: label }, "loop closed, task dropped");
			return;
		}
		this.run(key, task).catch((e: unknown) => {
			const error = classifyError(e);
			this.logger.error({ key, task: label, error: error.message }, "loop task failed");
		});
	}

	/** Bound `enqueue`, for components that only schedule. */
	readonly schedule: Scheduler = (key, label, task) => this.enqueue(key, label, task);

	/** Tasks queued or running for the key. */
	depth(key: PositionKey): number {
		return this.slots.get(key)?.pending ?? 0;
	}

	/** Resolves once every task queued so far has finished. */
	async drain(): Promise<void> {
		while (this.slots.size > 0) {
			await Promise.all([...this.slots.values()].map((s) => s.tail));
		}
	}

	/** Stops accepting scheduled tasks and waits for the queued ones. */
	async close(): Promise<void> {
		this.closed = true;
		await this.drain();
	}

	private slotFor(key: PositionKey): Slot {
		let slot = this.slots.get(key);
		if (slot === undefined) {
			slot = { tail: Promise.resolve(), pending: 0 };
			this.slots.set(key, slot);
		}
		return slot;
	}

	private release(key: PositionKey, slot: Slot): void {
		slot.pending--;
		if (slot.pending === 0 && this.slots.get(key) === slot) {
			this.slots.delete(key);
		}
	}
}
