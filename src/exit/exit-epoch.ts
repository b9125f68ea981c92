import type { PositionKey } from "../shared/identifiers.js";

/**
 * Per-position generation counter. An exit task captures the epoch when it
 * starts and stands down at its next suspension point if the kill switch or
 * an operator reset has bumped it since.
 */
export class ExitEpochs {
	private readonly epochs = new Map<PositionKey, number>();

	current(key: PositionKey): number {
		return this.epochs.get(key) ?? 0;
	}

	bump(key: PositionKey): number {
		const next = this.current(key) + 1;
		this.epochs.set(key, next);
		return next;
	}

	isCurrent(key: PositionKey, epoch: number): boolean {
		return this.current(key) === epoch;
	}
}
