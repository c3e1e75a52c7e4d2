/**
 * Gateway Configuration Schema
 *
 * Options recognized by a shard or a cluster of shards. Keys are
 * snake_case to match the YAML files and SHARDLINE_* environment variables.
 */

import { z } from "zod";

/** Lower bound accepted by the gateway for `large_threshold` */
export const LARGE_THRESHOLD_MINIMUM = 50;

/** Upper bound accepted by the gateway for `large_threshold` */
export const LARGE_THRESHOLD_MAXIMUM = 250;

export const DEFAULT_GATEWAY_URL = "wss://gateway.discord.gg";

export const GatewayConfigSchema = z
	.object({
		/**
		 * Bot token sent with identify and resume
		 * Env: SHARDLINE_TOKEN
		 */
		token: z.string().min(1),

		/**
		 * Intents bitmask, fixed for the lifetime of a session
		 * Env: SHARDLINE_INTENTS
		 */
		intents: z.number().int().nonnegative(),

		/**
		 * Index of this shard
		 * Default: 0
		 */
		shard_id: z.number().int().nonnegative().default(0),

		/**
		 * Total number of shards
		 * Default: 1
		 */
		shard_count: z.number().int().positive().default(1),

		/**
		 * Request zlib-stream transport compression
		 * Default: false
		 */
		compression: z.boolean().default(false),

		/**
		 * Member count above which guilds are sent without offline members
		 * Default: 50
		 */
		large_threshold: z
			.number()
			.int()
			.min(LARGE_THRESHOLD_MINIMUM)
			.max(LARGE_THRESHOLD_MAXIMUM)
			.default(LARGE_THRESHOLD_MINIMUM),

		/**
		 * Number of identify buckets (the service's max_concurrency)
		 * Default: 1
		 */
		identify_concurrency: z.number().int().positive().default(1),

		/**
		 * Identify window per bucket in milliseconds; 0 disables queueing
		 * Default: 5000
		 */
		identify_window_ms: z.number().int().nonnegative().default(5000),

		/**
		 * Identifies allowed per bucket per window; 0 disables queueing
		 * Default: 1
		 */
		identify_limit: z.number().int().nonnegative().default(1),

		/**
		 * Gateway websocket URL used when no resume URL is known
		 */
		gateway_url: z.string().url().default(DEFAULT_GATEWAY_URL),

		/**
		 * How long to wait for Hello after the socket opens
		 * Default: 20000
		 */
		hello_timeout_ms: z.number().int().positive().default(20_000),

		/**
		 * Apply the outbound command ratelimit to caller commands
		 * Default: true
		 */
		ratelimit_commands: z.boolean().default(true),
	})
	.refine((config) => config.shard_id < config.shard_count, {
		message: "shard_id must be less than shard_count",
		path: ["shard_id"],
	});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type GatewayConfigInput = z.input<typeof GatewayConfigSchema>;
