import { Throttle } from "./throttle.js";

export type HeartbeatTick = "send" | "zombied";

/**
 * Liveness bookkeeping for one socket. The first tick lands at a random
 * point within the first interval so shards started together spread out.
 */
export class Heartbeater {
	readonly throttle: Throttle;
	private lastSentAt: number | null = null;
	private acked = true;

	constructor(
		readonly intervalMs: number,
		random: () => number = Math.random
	) {
		this.throttle = new Throttle(intervalMs, { firstDelayMs: Math.floor(random() * intervalMs) });
	}

	get lastSent(): number | null {
		return this.lastSentAt;
	}

	get lastAcked(): boolean {
		return this.acked;
	}

	/** What to do on a tick: a heartbeat still awaiting its ack means the connection is dead. */
	tick(): HeartbeatTick {
		return this.acked ? "send" : "zombied";
	}

	markSent(now: number = Date.now()): void {
		this.lastSentAt = now;
		this.acked = false;
	}

	acknowledge(): void {
		this.acked = true;
	}

	stop(): void {
		this.throttle.cancel();
	}
}
