/**
 * Gateway info
 *
 * The one REST call a cluster makes: the recommended shard count, the
 * gateway URL and the session start limit.
 *
 * @see https://discord.com/developers/docs/topics/gateway#get-gateway-bot
 */

import { z } from "zod";
import { GatewayInfoError } from "../errors.js";

export const DEFAULT_API_BASE_URL = "https://discord.com/api/v10";

export const GatewayBotResponseSchema = z.object({
	url: z.string().url(),
	shards: z.number().int().positive(),
	session_start_limit: z.object({
		total: z.number().int().nonnegative(),
		remaining: z.number().int().nonnegative(),
		reset_after: z.number().int().nonnegative(),
		max_concurrency: z.number().int().positive(),
	}),
});

export interface GatewayBotInfo {
	url: string;
	shards: number;
	sessionStartLimit: {
		total: number;
		remaining: number;
		resetAfterMs: number;
		maxConcurrency: number;
	};
}

export interface GatewayInfoProvider {
	getGatewayBot(): Promise<GatewayBotInfo>;
}

export interface HttpGatewayInfoProviderOptions {
	token: string;
	baseUrl?: string;
	fetch?: typeof fetch;
}

export class HttpGatewayInfoProvider implements GatewayInfoProvider {
	private readonly token: string;
	private readonly baseUrl: string;
	private readonly fetchImpl: typeof fetch;

	constructor(options: HttpGatewayInfoProviderOptions) {
		this.token = options.token;
		this.baseUrl = options.baseUrl ?? DEFAULT_API_BASE_URL;
		this.fetchImpl = options.fetch ?? fetch;
	}

	async getGatewayBot(): Promise<GatewayBotInfo> {
		let response: Response;
		try {
			response = await this.fetchImpl(`${this.baseUrl}/gateway/bot`, {
				headers: { Authorization: `Bot ${this.token}` },
			});
		} catch (error) {
			throw new GatewayInfoError("gateway info request failed", null, error);
		}

		if (!response.ok) {
			throw new GatewayInfoError(`gateway info request returned ${response.status}`, response.status);
		}

		const parsed = GatewayBotResponseSchema.safeParse(await response.json());
		if (!parsed.success) {
			throw new GatewayInfoError("gateway info response is malformed", response.status, parsed.error);
		}

		const { url, shards, session_start_limit: limit } = parsed.data;
		return {
			url,
			shards,
			sessionStartLimit: {
				total: limit.total,
				remaining: limit.remaining,
				resetAfterMs: limit.reset_after,
				maxConcurrency: limit.max_concurrency,
			},
		};
	}
}
