import type { BucketSnapshot, IdentifyOutcome } from "./types.js";

export interface Waiter {
	shardIndex: number;
	settled: boolean;
	settle: (outcome: IdentifyOutcome) => void;
}

/**
 * One concurrency slot: `limit` identifies per `windowMs`, with the window
 * anchored at the first identify after a refill.
 */
export class IdentifyBucket {
	private remaining: number;
	private resetAt: number | null = null;
	private readonly waiters: Waiter[] = [];
	private timer: ReturnType<typeof setTimeout> | null = null;

	constructor(
		readonly id: number,
		readonly limit: number,
		readonly windowMs: number,
		private readonly now: () => number,
		private readonly onGrant: (bucket: IdentifyBucket, waiter: Waiter) => void
	) {
		this.remaining = limit;
	}

	get waiting(): number {
		return this.waiters.length;
	}

	add(waiter: Waiter): void {
		this.waiters.push(waiter);
		this.drain();
	}

	remove(waiter: Waiter): boolean {
		const index = this.waiters.indexOf(waiter);
		if (index === -1) {
			return false;
		}
		this.waiters.splice(index, 1);
		if (this.waiters.length === 0) {
			this.clearTimer();
		}
		return true;
	}

	snapshot(): BucketSnapshot {
		const expired = this.resetAt !== null && this.now() >= this.resetAt;
		return {
			bucketId: this.id,
			remaining: expired ? this.limit : this.remaining,
			limit: this.limit,
			windowMs: this.windowMs,
			resetAt: expired ? null : this.resetAt,
			waiting: this.waiters.length,
		};
	}

	dispose(): void {
		this.clearTimer();
		for (const waiter of this.waiters.splice(0)) {
			waiter.settled = true;
			waiter.settle("cancelled");
		}
	}

	private drain(): void {
		this.refill();
		while (this.remaining > 0) {
			const waiter = this.waiters.shift();
			if (!waiter) {
				return;
			}
			this.remaining -= 1;
			this.resetAt ??= this.now() + this.windowMs;
			waiter.settled = true;
			this.onGrant(this, waiter);
			waiter.settle("granted");
		}
		if (this.waiters.length > 0 && this.resetAt !== null && !this.timer) {
			this.timer = setTimeout(
				() => {
					this.timer = null;
					this.drain();
				},
				Math.max(0, this.resetAt - this.now())
			);
		}
	}

	private refill(): void {
		if (this.resetAt !== null && this.now() >= this.resetAt) {
			this.remaining = this.limit;
			this.resetAt = null;
		}
	}

	private clearTimer(): void {
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
	}
}
