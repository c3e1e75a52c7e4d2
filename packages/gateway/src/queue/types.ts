export type IdentifyOutcome = "granted" | "cancelled";

/**
 * A pending identify request. `granted` settles exactly once; cancelling a
 * ticket that already settled has no effect.
 */
export interface IdentifyTicket {
	readonly granted: Promise<IdentifyOutcome>;
	cancel(): void;
}

/**
 * Admission control for Identify commands, shared by every shard of a
 * process (or, in a custom implementation, several processes).
 */
export interface IdentifyQueue {
	enqueue(shardIndex: number, signal?: AbortSignal): IdentifyTicket;
}

export interface BucketSnapshot {
	bucketId: number;
	remaining: number;
	limit: number;
	windowMs: number;
	/** When the current window ends; null before the first identify of a window */
	resetAt: number | null;
	waiting: number;
}
