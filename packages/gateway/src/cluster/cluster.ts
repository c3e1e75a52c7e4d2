/**
 * Cluster
 *
 * Runs a set of shards in one process. Shards share a single identify queue
 * and a single listener registry; each still owns its socket and session.
 */

import { EventChannel } from "../channel.js";
import { ShardIdError } from "../errors.js";
import type { GatewayEvent } from "../events.js";
import { ListenerRegistry, type Subscription } from "../listeners.js";
import { log } from "../logger.js";
import type { UserCommand } from "../payloads.js";
import { BucketedIdentifyQueue, type IdentifyQueue } from "../queue/index.js";
import type { ResumeSession } from "../session.js";
import { Shard, type ShardInfo, type ShardOptions } from "../shard/index.js";
import { ShardId } from "../shard-id.js";
import { type GatewayInfoProvider, HttpGatewayInfoProvider } from "./gateway-info.js";
import { type ShardScheme, shardIndices } from "./scheme.js";

// ============================================
// Types
// ============================================

export interface ClusterOptions extends Omit<ShardOptions, "queue" | "listeners" | "session"> {
	/** Default: auto */
	scheme?: ShardScheme;
	/** Consulted for the auto scheme. Default: the HTTP provider with `token` */
	gatewayInfo?: GatewayInfoProvider;
	/** Default: a bucketed queue sized from the gateway's max concurrency */
	queue?: IdentifyQueue;
	/** Buckets of the default queue when the gateway info is not consulted (default: 1) */
	maxConcurrency?: number;
	/** Saved sessions by shard index, resumed on first connect */
	sessions?: ReadonlyMap<number, ResumeSession>;
}

export interface ClusterEvent {
	shardId: number;
	event: GatewayEvent;
}

// ============================================
// Cluster
// ============================================

export class Cluster {
	private aggregate: EventChannel<ClusterEvent> | null = null;

	private constructor(
		private readonly shardMap: ReadonlyMap<number, Shard>,
		readonly queue: IdentifyQueue,
		readonly listeners: ListenerRegistry
	) {}

	/**
	 * Resolves the shard scheme and builds every shard without connecting.
	 * Only the auto scheme makes a gateway info request.
	 */
	static async create(options: ClusterOptions): Promise<Cluster> {
		const { scheme = { type: "auto" }, gatewayInfo, queue, maxConcurrency, sessions, ...shardOptions } = options;

		let indices: number[];
		let total: number;
		let concurrency = maxConcurrency ?? 1;
		let gatewayUrl = shardOptions.gatewayUrl;

		if (scheme.type === "auto") {
			const provider = gatewayInfo ?? new HttpGatewayInfoProvider({ token: options.token });
			const info = await provider.getGatewayBot();
			total = info.shards;
			indices = shardIndices({ type: "range", from: 0, to: total - 1, total });
			concurrency = maxConcurrency ?? info.sessionStartLimit.maxConcurrency;
			gatewayUrl ??= info.url;

			if (info.sessionStartLimit.remaining < indices.length) {
				log.warn(
					{
						remaining: info.sessionStartLimit.remaining,
						shards: indices.length,
						resetAfterMs: info.sessionStartLimit.resetAfterMs,
					},
					"Session start limit is lower than the number of shards"
				);
			}
		} else {
			total = scheme.total;
			indices = shardIndices(scheme);
			if (scheme.type === "bucket") {
				concurrency = scheme.concurrency;
			}
		}

		const sharedQueue =
			queue ?? new BucketedIdentifyQueue({ maxConcurrency: concurrency, metrics: shardOptions.metrics });
		const listeners = new ListenerRegistry();

		const shards = new Map<number, Shard>();
		for (const index of indices) {
			shards.set(
				index,
				new Shard(new ShardId(index, total), {
					...shardOptions,
					gatewayUrl,
					queue: sharedQueue,
					listeners,
					session: sessions?.get(index),
				})
			);
		}

		log.info({ shards: indices.length, total, concurrency, scheme: scheme.type }, "Cluster created");
		return new Cluster(shards, sharedQueue, listeners);
	}

	// ============================================
	// Lifecycle
	// ============================================

	/** Starts every shard. Identifies are paced by the shared queue. */
	up(): void {
		for (const shard of this.shardMap.values()) {
			shard.start();
		}
	}

	down(): void {
		for (const shard of this.shardMap.values()) {
			shard.shutdown();
		}
		this.listeners.clear();
	}

	/** Shuts every shard down without invalidating sessions. */
	downResumable(): Map<number, ResumeSession> {
		const sessions = new Map<number, ResumeSession>();
		for (const [index, shard] of this.shardMap) {
			const session = shard.shutdownResumable();
			if (session) {
				sessions.set(index, session);
			}
		}
		this.listeners.clear();
		return sessions;
	}

	// ============================================
	// Access
	// ============================================

	shard(index: number): Shard | undefined {
		return this.shardMap.get(index);
	}

	shards(): IterableIterator<Shard> {
		return this.shardMap.values();
	}

	info(): Map<number, ShardInfo> {
		const info = new Map<number, ShardInfo>();
		for (const [index, shard] of this.shardMap) {
			info.set(index, shard.info());
		}
		return info;
	}

	async command(index: number, command: UserCommand): Promise<void> {
		const shard = this.shardMap.get(index);
		if (!shard) {
			throw new ShardIdError(`shard ${index} is not part of this cluster`, "INDEX_OUT_OF_RANGE");
		}
		await shard.send(command);
	}

	subscribe(mask?: bigint): Subscription {
		return this.listeners.subscribe(mask);
	}

	/**
	 * Events of every shard in one stream, in arrival order. Calling it
	 * starts the shards and their own streams; events from before the first
	 * call reach subscribers only. The stream ends once every shard has
	 * shut down.
	 */
	events(): EventChannel<ClusterEvent> {
		if (this.aggregate) {
			return this.aggregate;
		}
		const aggregate = new EventChannel<ClusterEvent>();
		this.aggregate = aggregate;

		let remaining = this.shardMap.size;
		if (remaining === 0) {
			aggregate.close();
		}
		for (const shard of this.shardMap.values()) {
			void this.pump(shard, aggregate).finally(() => {
				remaining -= 1;
				if (remaining === 0) {
					aggregate.close();
				}
			});
		}
		return aggregate;
	}

	private async pump(shard: Shard, aggregate: EventChannel<ClusterEvent>): Promise<void> {
		try {
			for await (const event of shard) {
				if (!aggregate.push({ shardId: shard.id.index, event })) {
					return;
				}
			}
		} catch (error) {
			log.error(
				{ shard: shard.id.toString(), error: error instanceof Error ? error.message : String(error) },
				"Shard stopped with a fatal error"
			);
		}
	}
}
