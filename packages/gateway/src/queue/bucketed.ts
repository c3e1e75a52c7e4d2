import { log } from "../logger.js";
import { type GatewayMetrics, setIdentifyQueueWaiting } from "../metrics/index.js";
import { IdentifyBucket, type Waiter } from "./bucket.js";
import type { BucketSnapshot, IdentifyOutcome, IdentifyQueue, IdentifyTicket } from "./types.js";

export interface BucketedIdentifyQueueOptions {
	/** Number of buckets; shard `i` uses bucket `i % maxConcurrency` */
	maxConcurrency: number;
	/** Identifies per bucket per window (default: 1) */
	limit?: number;
	/** Window length in ms (default: 5000) */
	windowMs?: number;
	metrics?: GatewayMetrics;
	now?: () => number;
}

export const DEFAULT_IDENTIFY_WINDOW_MS = 5000;
export const DEFAULT_IDENTIFY_LIMIT = 1;

/**
 * In-process identify queue. Requests in the same bucket are granted in
 * arrival order; buckets never wait on each other.
 */
export class BucketedIdentifyQueue implements IdentifyQueue {
	readonly maxConcurrency: number;
	readonly limit: number;
	readonly windowMs: number;
	private readonly buckets = new Map<number, IdentifyBucket>();
	private readonly metrics: GatewayMetrics | undefined;
	private readonly now: () => number;

	constructor(options: BucketedIdentifyQueueOptions) {
		if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1) {
			throw new RangeError(`maxConcurrency must be a positive integer, got ${options.maxConcurrency}`);
		}
		this.maxConcurrency = options.maxConcurrency;
		this.limit = options.limit ?? DEFAULT_IDENTIFY_LIMIT;
		this.windowMs = options.windowMs ?? DEFAULT_IDENTIFY_WINDOW_MS;
		this.metrics = options.metrics;
		this.now = options.now ?? Date.now;
	}

	enqueue(shardIndex: number, signal?: AbortSignal): IdentifyTicket {
		if (this.limit === 0 || this.windowMs === 0) {
			return { granted: Promise.resolve("granted"), cancel: () => {} };
		}

		const bucket = this.bucket(shardIndex % this.maxConcurrency);
		let settle: (outcome: IdentifyOutcome) => void = () => {};
		const granted = new Promise<IdentifyOutcome>((resolve) => {
			settle = resolve;
		});
		const waiter: Waiter = { shardIndex, settled: false, settle };

		const cancel = () => {
			if (waiter.settled) {
				return;
			}
			waiter.settled = true;
			bucket.remove(waiter);
			this.reportWaiting(bucket);
			log.debug({ shard: shardIndex, bucket: bucket.id }, "Identify request cancelled");
			settle("cancelled");
		};

		if (signal?.aborted) {
			waiter.settled = true;
			settle("cancelled");
			return { granted, cancel };
		}
		signal?.addEventListener("abort", cancel, { once: true });
		void granted.then(() => signal?.removeEventListener("abort", cancel));

		bucket.add(waiter);
		this.reportWaiting(bucket);
		return { granted, cancel };
	}

	inspect(bucketId: number): BucketSnapshot {
		const bucket = this.buckets.get(bucketId);
		if (bucket) {
			return bucket.snapshot();
		}
		return {
			bucketId,
			remaining: this.limit,
			limit: this.limit,
			windowMs: this.windowMs,
			resetAt: null,
			waiting: 0,
		};
	}

	/** Cancels every waiter and stops all timers. */
	close(): void {
		for (const bucket of this.buckets.values()) {
			bucket.dispose();
			this.reportWaiting(bucket);
		}
		this.buckets.clear();
	}

	private bucket(bucketId: number): IdentifyBucket {
		let bucket = this.buckets.get(bucketId);
		if (!bucket) {
			bucket = new IdentifyBucket(bucketId, this.limit, this.windowMs, this.now, (owner, waiter) => {
				log.debug({ shard: waiter.shardIndex, bucket: owner.id }, "Identify granted");
				// The waiter has already left the bucket when this runs.
				this.reportWaiting(owner);
			});
			this.buckets.set(bucketId, bucket);
		}
		return bucket;
	}

	private reportWaiting(bucket: IdentifyBucket): void {
		if (this.metrics) {
			setIdentifyQueueWaiting(this.metrics, bucket.id, bucket.waiting);
		}
	}
}
