/**
 * @shardline/config - Gateway configuration schema and loader
 */

export { type ConfigIssue, GatewayConfigError } from "./error.js";
export {
	type ConfigEnvironment,
	type LoadGatewayConfigOptions,
	loadGatewayConfig,
	parseGatewayConfig,
	readEnvOverrides,
	resolveEnvironment,
} from "./loader.js";
export {
	DEFAULT_GATEWAY_URL,
	type GatewayConfig,
	type GatewayConfigInput,
	GatewayConfigSchema,
	LARGE_THRESHOLD_MAXIMUM,
	LARGE_THRESHOLD_MINIMUM,
} from "./schemas/gateway.js";
