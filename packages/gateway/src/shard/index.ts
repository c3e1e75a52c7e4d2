export { OutboundQueue } from "./outbound-queue.js";
export { Shard } from "./shard.js";
export type { ReconnectConfig, ShardInfo, ShardOptions, ShardStage } from "./types.js";
export { buildGatewayUrl } from "./url.js";
