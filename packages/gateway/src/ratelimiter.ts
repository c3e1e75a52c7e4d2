import { sleep } from "./throttle.js";

export const COMMANDS_PER_RESET = 120;
export const RESET_PERIOD_MS = 60_000;

/** Slots kept free for heartbeats within one reset period. */
export function heartbeatsPerReset(heartbeatIntervalMs: number): number {
	return Math.ceil(RESET_PERIOD_MS / heartbeatIntervalMs);
}

/**
 * Sliding-window limiter for caller commands on one socket. Capacity left
 * for heartbeats is subtracted from the gateway's per-connection limit.
 */
export class CommandRatelimiter {
	readonly max: number;
	private readonly instants: number[] = [];
	private readonly now: () => number;

	constructor(heartbeatIntervalMs: number, now: () => number = Date.now) {
		this.max = Math.max(1, COMMANDS_PER_RESET - heartbeatsPerReset(heartbeatIntervalMs));
		this.now = now;
	}

	available(): number {
		this.expire();
		return this.max - this.instants.length;
	}

	/** Milliseconds until a slot frees up; 0 when one is available now. */
	nextAvailableIn(): number {
		this.expire();
		const oldest = this.instants[0];
		if (this.instants.length < this.max || oldest === undefined) {
			return 0;
		}
		return oldest + RESET_PERIOD_MS - this.now();
	}

	/**
	 * Waits for a slot and takes it. Resolves `false` if the signal aborts
	 * first, in which case no slot is taken.
	 */
	async acquire(signal?: AbortSignal): Promise<boolean> {
		for (;;) {
			const wait = this.nextAvailableIn();
			if (wait === 0) {
				this.instants.push(this.now());
				return true;
			}
			if (!(await sleep(wait, signal))) {
				return false;
			}
		}
	}

	private expire(): void {
		const cutoff = this.now() - RESET_PERIOD_MS;
		while (this.instants.length > 0 && (this.instants[0] ?? Infinity) <= cutoff) {
			this.instants.shift();
		}
	}
}
