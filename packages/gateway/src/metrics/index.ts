/**
 * Gateway Monitoring & Observability
 *
 * Prometheus metrics for gateway traffic, reconnects, heartbeat latency,
 * identify queue depth and compression.
 */

import { Counter, Gauge, Histogram, Registry } from "prom-client";

// ============================================
// Constants
// ============================================

/**
 * Histogram buckets for heartbeat round trips (in seconds)
 */
export const HEARTBEAT_LATENCY_BUCKETS = [0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5];

// ============================================
// Types
// ============================================

export interface MetricsConfig {
  /** Custom metric prefix (default: "gateway") */
  prefix?: string;
  /** Custom registry (default: a fresh one) */
  registry?: Registry;
}

export interface GatewayMetrics {
  /** Inbound payloads by shard and opcode name */
  payloads: Counter<"shard" | "op">;
  /** Reconnects by shard and failure kind */
  reconnects: Counter<"shard" | "reason">;
  /** Heartbeat round trip by shard */
  heartbeatLatency: Histogram<"shard">;
  /** Shards waiting on the identify queue by bucket */
  identifyQueueWaiting: Gauge<"bucket">;
  /** Connection state per shard (1=connected, 0=not connected) */
  shardConnected: Gauge<"shard">;
  /** Compressed bytes fed to the inflater */
  inflaterBytesIn: Counter<"shard">;
  /** Bytes produced by the inflater */
  inflaterBytesOut: Counter<"shard">;
  registry: Registry;
}

// ============================================
// Factory
// ============================================

/**
 * Create gateway metrics instance
 *
 * @example
 * ```typescript
 * const metrics = createGatewayMetrics({ prefix: "bot_gateway" });
 * const cluster = await Cluster.create({ token, intents, metrics, gatewayInfo });
 * const output = await metrics.registry.metrics();
 * ```
 */
export function createGatewayMetrics(config: MetricsConfig = {}): GatewayMetrics {
  const { prefix = "gateway", registry = new Registry() } = config;

  const payloads = new Counter({
    name: `${prefix}_payloads_total`,
    help: "Inbound gateway payloads by shard and opcode",
    labelNames: ["shard", "op"] as const,
    registers: [registry],
  });

  const reconnects = new Counter({
    name: `${prefix}_reconnects_total`,
    help: "Shard reconnects by failure kind",
    labelNames: ["shard", "reason"] as const,
    registers: [registry],
  });

  const heartbeatLatency = new Histogram({
    name: `${prefix}_heartbeat_latency_seconds`,
    help: "Heartbeat round trip by shard",
    labelNames: ["shard"] as const,
    buckets: HEARTBEAT_LATENCY_BUCKETS,
    registers: [registry],
  });

  const identifyQueueWaiting = new Gauge({
    name: `${prefix}_identify_queue_waiting`,
    help: "Shards waiting for an identify permit by bucket",
    labelNames: ["bucket"] as const,
    registers: [registry],
  });

  const shardConnected = new Gauge({
    name: `${prefix}_shard_connected`,
    help: "Shard connection state (1=connected, 0=not connected)",
    labelNames: ["shard"] as const,
    registers: [registry],
  });

  const inflaterBytesIn = new Counter({
    name: `${prefix}_inflater_bytes_in_total`,
    help: "Compressed bytes received by shard",
    labelNames: ["shard"] as const,
    registers: [registry],
  });

  const inflaterBytesOut = new Counter({
    name: `${prefix}_inflater_bytes_out_total`,
    help: "Decompressed bytes produced by shard",
    labelNames: ["shard"] as const,
    registers: [registry],
  });

  return {
    payloads,
    reconnects,
    heartbeatLatency,
    identifyQueueWaiting,
    shardConnected,
    inflaterBytesIn,
    inflaterBytesOut,
    registry,
  };
}

// ============================================
// Helper Functions
// ============================================

export function recordPayload(metrics: GatewayMetrics, shard: number, op: string): void {
  metrics.payloads.inc({ shard: String(shard), op });
}

export function recordReconnect(metrics: GatewayMetrics, shard: number, reason: string): void {
  metrics.reconnects.inc({ shard: String(shard), reason });
}

export function recordHeartbeatLatency(metrics: GatewayMetrics, shard: number, latencyMs: number): void {
  metrics.heartbeatLatency.observe({ shard: String(shard) }, latencyMs / 1000);
}

export function setIdentifyQueueWaiting(metrics: GatewayMetrics, bucket: number, waiting: number): void {
  metrics.identifyQueueWaiting.set({ bucket: String(bucket) }, waiting);
}

export function setShardConnected(metrics: GatewayMetrics, shard: number, connected: boolean): void {
  metrics.shardConnected.set({ shard: String(shard) }, connected ? 1 : 0);
}

export function recordInflated(metrics: GatewayMetrics, shard: number, bytesIn: number, bytesOut: number): void {
  metrics.inflaterBytesIn.inc({ shard: String(shard) }, bytesIn);
  metrics.inflaterBytesOut.inc({ shard: String(shard) }, bytesOut);
}
