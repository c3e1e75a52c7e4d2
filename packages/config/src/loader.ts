/**
 * Configuration Loader
 *
 * Loads gateway configuration from YAML files with environment-specific
 * overrides, then applies SHARDLINE_* environment variables on top.
 *
 * Precedence (highest to lowest):
 * 1. Environment variables (SHARDLINE_*)
 * 2. Environment-specific YAML (development.yaml, production.yaml)
 * 3. Default YAML (default.yaml)
 */

import { readFile } from "node:fs/promises";
import { deepmerge } from "deepmerge-ts";
import { parse } from "yaml";
import { GatewayConfigError } from "./error.js";
import { log } from "./logger.js";
import { type GatewayConfig, GatewayConfigSchema } from "./schemas/gateway.js";

export type ConfigEnvironment = "development" | "production";

export interface LoadGatewayConfigOptions {
	/** Directory holding default.yaml and <environment>.yaml; skipped when absent */
	configDir?: string;
	/** Which override file to merge (default: derived from SHARDLINE_ENV / NODE_ENV) */
	environment?: ConfigEnvironment;
	/** Environment variables to read (default: process.env) */
	env?: NodeJS.ProcessEnv;
}

type EnvKind = "string" | "number" | "boolean";

const ENV_KEYS: Record<string, [key: keyof GatewayConfig, kind: EnvKind]> = {
	SHARDLINE_TOKEN: ["token", "string"],
	SHARDLINE_INTENTS: ["intents", "number"],
	SHARDLINE_SHARD_ID: ["shard_id", "number"],
	SHARDLINE_SHARD_COUNT: ["shard_count", "number"],
	SHARDLINE_COMPRESSION: ["compression", "boolean"],
	SHARDLINE_LARGE_THRESHOLD: ["large_threshold", "number"],
	SHARDLINE_IDENTIFY_CONCURRENCY: ["identify_concurrency", "number"],
	SHARDLINE_IDENTIFY_WINDOW_MS: ["identify_window_ms", "number"],
	SHARDLINE_IDENTIFY_LIMIT: ["identify_limit", "number"],
	SHARDLINE_GATEWAY_URL: ["gateway_url", "string"],
	SHARDLINE_HELLO_TIMEOUT_MS: ["hello_timeout_ms", "number"],
	SHARDLINE_RATELIMIT_COMMANDS: ["ratelimit_commands", "boolean"],
};

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load and parse a YAML file
 *
 * @returns Parsed mapping, or null when the file does not exist
 * @throws GatewayConfigError if the file cannot be read or is not a mapping
 */
async function loadYaml(path: string): Promise<Record<string, unknown> | null> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		if (isMissingFile(error)) {
			return null;
		}
		throw GatewayConfigError.loadFailed(path, error);
	}

	let parsed: unknown;
	try {
		parsed = parse(content);
	} catch (error) {
		throw GatewayConfigError.loadFailed(path, error);
	}

	if (parsed == null) {
		return {};
	}
	if (!isRecord(parsed)) {
		throw GatewayConfigError.loadFailed(path, new Error("top level must be a mapping"));
	}
	return parsed;
}

function convertEnvValue(raw: string, kind: EnvKind): string | number | boolean {
	switch (kind) {
		case "number":
			return raw.trim() === "" ? Number.NaN : Number(raw);
		case "boolean":
			return raw === "true" || raw === "1";
		default:
			return raw;
	}
}

/**
 * Collect SHARDLINE_* overrides, converted to the schema's types
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
	const overrides: Record<string, unknown> = {};
	for (const [name, [key, kind]] of Object.entries(ENV_KEYS)) {
		const raw = env[name];
		if (raw === undefined) {
			continue;
		}
		overrides[key] = convertEnvValue(raw, kind);
	}
	return overrides;
}

export function resolveEnvironment(env: NodeJS.ProcessEnv): ConfigEnvironment {
	if (env.SHARDLINE_ENV === "production" || env.NODE_ENV === "production") {
		return "production";
	}
	return "development";
}

/**
 * Validate a raw configuration object
 *
 * @throws GatewayConfigError listing every failing field
 */
export function parseGatewayConfig(raw: unknown): GatewayConfig {
	const result = GatewayConfigSchema.safeParse(raw);
	if (!result.success) {
		throw GatewayConfigError.validationFailed(result.error);
	}
	return result.data;
}

/**
 * Load gateway configuration from files and environment variables
 *
 * @example
 * ```typescript
 * const config = await loadGatewayConfig({ configDir: "configs" });
 * const shard = createShardFromConfig(config); // @shardline/gateway
 * ```
 */
export async function loadGatewayConfig(
	options: LoadGatewayConfigOptions = {}
): Promise<GatewayConfig> {
	const env = options.env ?? process.env;
	const environment = options.environment ?? resolveEnvironment(env);

	const empty: Record<string, unknown> = {};
	let fileConfig: Record<string, unknown> = empty;
	if (options.configDir) {
		const base = await loadYaml(`${options.configDir}/default.yaml`);
		const override = await loadYaml(`${options.configDir}/${environment}.yaml`);
		if (!override) {
			log.debug({ environment }, "No environment override file, using defaults only");
		}
		fileConfig = deepmerge(base ?? empty, override ?? empty);
	}

	const merged = deepmerge(fileConfig, readEnvOverrides(env));
	const config = parseGatewayConfig(merged);

	log.debug(
		{
			shard: `${config.shard_id}/${config.shard_count}`,
			compression: config.compression,
			identify_concurrency: config.identify_concurrency,
		},
		"Loaded gateway config"
	);

	return config;
}
