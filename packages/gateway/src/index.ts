/**
 * @shardline/gateway
 *
 * Long-lived, resumable gateway connections ("shards"), the identify
 * admission queue they share and a cluster that runs many of them.
 *
 * @example
 * ```typescript
 * import { Cluster, combineIntents, GatewayIntents } from "@shardline/gateway";
 *
 * const cluster = await Cluster.create({
 *   token,
 *   intents: combineIntents(GatewayIntents.Guilds, GatewayIntents.GuildMessages),
 * });
 *
 * for await (const { shardId, event } of cluster.events()) {
 *   if (event.type === "dispatch") {
 *     console.log(shardId, event.name);
 *   }
 * }
 * ```
 */

export const PACKAGE_NAME = "@shardline/gateway";
export const VERSION = "0.1.0";

// ============================================
// Protocol
// ============================================

export {
	classifyClose,
	type CloseClassification,
	CloseCode,
	closeCodeName,
	type CloseInfo,
} from "./close-codes.js";
export {
	API_VERSION,
	combineIntents,
	DEFAULT_GATEWAY_URL,
	DEFAULT_HELLO_TIMEOUT_MS,
	DEFAULT_LARGE_THRESHOLD,
	DEFAULT_RECONNECT_CONFIG,
	GatewayIntents,
	OpCode,
	opcodeName,
} from "./constants.js";
export * from "./events.js";
export * from "./payloads.js";

// ============================================
// Errors
// ============================================

export {
	GatewayInfoError,
	ShardError,
	type ShardErrorKind,
	ShardIdError,
	type ShardIdErrorCode,
	ShardSchemeError,
	type ShardSchemeErrorCode,
} from "./errors.js";

// ============================================
// Shards
// ============================================

export {
	buildGatewayUrl,
	OutboundQueue,
	type ReconnectConfig,
	Shard,
	type ShardInfo,
	type ShardOptions,
	type ShardStage,
} from "./shard/index.js";
export { ShardId } from "./shard-id.js";
export { type ResumeSession, Session } from "./session.js";
export { type LatencySnapshot, Latency } from "./latency.js";
export { type HeartbeatTick, Heartbeater } from "./heartbeat.js";
export { COMMANDS_PER_RESET, CommandRatelimiter, heartbeatsPerReset, RESET_PERIOD_MS } from "./ratelimiter.js";
export { sleep, Throttle, type ThrottleOptions } from "./throttle.js";
export { Inflater, ZLIB_SUFFIX } from "./compression/inflater.js";
export {
	ABNORMAL_CLOSURE,
	connectWebSocket,
	type GatewaySocket,
	type SocketFactory,
	type SocketFrame,
} from "./socket.js";
export { type ConfiguredShard, createShardFromConfig, shardOptionsFromConfig } from "./config.js";

// ============================================
// Identify queue
// ============================================

export {
	BucketedIdentifyQueue,
	type BucketedIdentifyQueueOptions,
	type BucketSnapshot,
	DEFAULT_IDENTIFY_LIMIT,
	DEFAULT_IDENTIFY_WINDOW_MS,
	type IdentifyOutcome,
	type IdentifyQueue,
	type IdentifyTicket,
	NoopIdentifyQueue,
} from "./queue/index.js";

// ============================================
// Fan-out and clusters
// ============================================

export { EventChannel } from "./channel.js";
export { ListenerRegistry, type Subscription } from "./listeners.js";
export {
	Cluster,
	type ClusterEvent,
	type ClusterOptions,
	DEFAULT_API_BASE_URL,
	type GatewayBotInfo,
	GatewayBotResponseSchema,
	type GatewayInfoProvider,
	HttpGatewayInfoProvider,
	type HttpGatewayInfoProviderOptions,
	type ResolvedShardScheme,
	type ShardScheme,
	shardIndices,
} from "./cluster/index.js";

// ============================================
// Metrics
// ============================================

export {
	createGatewayMetrics,
	type GatewayMetrics,
	HEARTBEAT_LATENCY_BUCKETS,
	type MetricsConfig,
	recordHeartbeatLatency,
	recordInflated,
	recordPayload,
	recordReconnect,
	setIdentifyQueueWaiting,
	setShardConnected,
} from "./metrics/index.js";
