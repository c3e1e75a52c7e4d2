export interface LatencySnapshot {
	/** Mean round trip over every acknowledged heartbeat, in ms */
	average: number | null;
	heartbeats: number;
	/** Most recent round trips, newest first */
	recent: number[];
	sent: number | null;
	received: number | null;
}

/**
 * Heartbeat round-trip tracking for one shard.
 */
export class Latency {
	static readonly RECENT_LENGTH = 5;

	private heartbeats = 0;
	private totalMs = 0;
	private recent: number[] = [];
	private sent: number | null = null;
	private received: number | null = null;
	private outstanding: number | null = null;

	trackSent(now: number = Date.now()): void {
		this.sent = now;
		this.outstanding = now;
	}

	/** Records an acknowledgement and returns its round trip, if a heartbeat was outstanding. */
	trackReceived(now: number = Date.now()): number | null {
		this.received = now;
		if (this.outstanding === null) {
			return null;
		}
		const rtt = now - this.outstanding;
		this.heartbeats += 1;
		this.totalMs += rtt;
		this.recent.unshift(rtt);
		if (this.recent.length > Latency.RECENT_LENGTH) {
			this.recent.pop();
		}
		this.outstanding = null;
		return rtt;
	}

	get average(): number | null {
		return this.heartbeats === 0 ? null : this.totalMs / this.heartbeats;
	}

	snapshot(): LatencySnapshot {
		return {
			average: this.average,
			heartbeats: this.heartbeats,
			recent: [...this.recent],
			sent: this.sent,
			received: this.received,
		};
	}
}
