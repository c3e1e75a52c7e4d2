import type { Logger } from "@shardline/logger";
import type { ListenerRegistry } from "../listeners.js";
import type { GatewayMetrics } from "../metrics/index.js";
import type { IdentifyProperties, UpdatePresenceData } from "../payloads.js";
import type { IdentifyQueue } from "../queue/index.js";
import type { LatencySnapshot } from "../latency.js";
import type { ResumeSession } from "../session.js";
import type { SocketFactory } from "../socket.js";

// ============================================
// Stages
// ============================================

export type ShardStage =
	| "disconnected"
	| "connecting"
	| "waiting_for_hello"
	| "identifying"
	| "resuming"
	| "connected"
	| "reconnecting"
	| "shut_down";

// ============================================
// Options
// ============================================

export interface ReconnectConfig {
	initialDelayMs: number;
	maxDelayMs: number;
	backoffMultiplier: number;
}

export interface ShardOptions {
	token: string;
	/** Intent bitset sent with Identify */
	intents: number;
	/** Default: wss://gateway.discord.gg */
	gatewayUrl?: string;
	/** Request the zlib-stream transport (default: false) */
	compression?: boolean;
	/** 50-250 (default: 50) */
	largeThreshold?: number;
	identifyProperties?: IdentifyProperties;
	presence?: UpdatePresenceData;
	/** Default: a queue that grants immediately */
	queue?: IdentifyQueue;
	/**
	 * Secondary subscribers. When set, the shard's own event stream buffers
	 * only from the first `nextEvent()` or iteration onwards.
	 */
	listeners?: ListenerRegistry;
	/** Event kinds delivered to `nextEvent()` (default: everything except raw payloads) */
	eventTypes?: bigint;
	/** Resume this session on the first connection */
	session?: ResumeSession;
	/** Default: 20000 */
	helloTimeoutMs?: number;
	/** Limit caller commands to the gateway's per-connection budget (default: true) */
	ratelimitCommands?: boolean;
	reconnect?: Partial<ReconnectConfig>;
	metrics?: GatewayMetrics;
	socketFactory?: SocketFactory;
	/** Source of heartbeat jitter (default: Math.random) */
	random?: () => number;
	logger?: Logger;
}

// ============================================
// Introspection
// ============================================

export interface ShardInfo {
	id: number;
	total: number;
	stage: ShardStage;
	session: ResumeSession | null;
	latency: LatencySnapshot;
}
