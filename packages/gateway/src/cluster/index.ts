export { Cluster, type ClusterEvent, type ClusterOptions } from "./cluster.js";
export {
	DEFAULT_API_BASE_URL,
	type GatewayBotInfo,
	GatewayBotResponseSchema,
	type GatewayInfoProvider,
	HttpGatewayInfoProvider,
	type HttpGatewayInfoProviderOptions,
} from "./gateway-info.js";
export { type ResolvedShardScheme, type ShardScheme, shardIndices } from "./scheme.js";
