import type { GatewayConfig } from "@shardline/config";
import { BucketedIdentifyQueue } from "./queue/index.js";
import { Shard, type ShardOptions } from "./shard/index.js";
import { ShardId } from "./shard-id.js";

export interface ConfiguredShard {
	id: ShardId;
	options: ShardOptions;
}

/**
 * Maps a validated gateway config onto shard options. The identify settings
 * become a new bucketed queue unless `overrides.queue` supplies a shared one.
 */
export function shardOptionsFromConfig(config: GatewayConfig, overrides: Partial<ShardOptions> = {}): ConfiguredShard {
	const queue =
		overrides.queue ??
		new BucketedIdentifyQueue({
			maxConcurrency: config.identify_concurrency,
			limit: config.identify_limit,
			windowMs: config.identify_window_ms,
			metrics: overrides.metrics,
		});

	return {
		id: new ShardId(config.shard_id, config.shard_count),
		options: {
			...overrides,
			token: config.token,
			intents: config.intents,
			gatewayUrl: config.gateway_url,
			compression: config.compression,
			largeThreshold: config.large_threshold,
			helloTimeoutMs: config.hello_timeout_ms,
			ratelimitCommands: config.ratelimit_commands,
			queue,
		},
	};
}

export function createShardFromConfig(config: GatewayConfig, overrides: Partial<ShardOptions> = {}): Shard {
	const { id, options } = shardOptionsFromConfig(config, overrides);
	return new Shard(id, options);
}
