export interface ThrottleOptions {
	/** Delay before the first deadline (default: one interval) */
	firstDelayMs?: number;
	now?: () => number;
}

/**
 * Repeating deadline source. Each deadline is computed from the previous
 * one, so slow consumers do not push later ticks back.
 */
export class Throttle {
	private deadline: number;
	private timer: ReturnType<typeof setTimeout> | null = null;
	private readonly now: () => number;

	constructor(
		readonly intervalMs: number,
		options: ThrottleOptions = {}
	) {
		this.now = options.now ?? Date.now;
		this.deadline = this.now() + (options.firstDelayMs ?? intervalMs);
	}

	get nextDeadline(): number {
		return this.deadline;
	}

	/**
	 * Resolves at the pending deadline and advances it. Ticks missed while
	 * nobody was waiting are skipped rather than replayed back to back.
	 */
	next(): Promise<void> {
		this.cancel();
		const delay = Math.max(0, this.deadline - this.now());
		return new Promise<void>((resolve) => {
			this.timer = setTimeout(() => {
				this.timer = null;
				const now = this.now();
				this.deadline += this.intervalMs;
				while (this.deadline <= now) {
					this.deadline += this.intervalMs;
				}
				resolve();
			}, delay);
		});
	}

	/** Stops the pending tick; its promise never settles. */
	cancel(): void {
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
	}
}

/**
 * Sleeps for `ms`. Resolves `false` early when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
	if (signal?.aborted) {
		return Promise.resolve(false);
	}
	return new Promise<boolean>((resolve) => {
		const onAbort = () => {
			clearTimeout(timer);
			resolve(false);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve(true);
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
