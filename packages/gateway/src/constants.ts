/**
 * Gateway protocol constants.
 */

export { DEFAULT_GATEWAY_URL } from "@shardline/config";

/** Gateway API version sent as the `v` query parameter */
export const API_VERSION = 10;

/** Time allowed between the socket opening and Hello arriving */
export const DEFAULT_HELLO_TIMEOUT_MS = 20_000;

export const DEFAULT_LARGE_THRESHOLD = 50;

/** Delays applied only to repeated socket-open failures and rate-limited closes */
export const DEFAULT_RECONNECT_CONFIG = {
	initialDelayMs: 1000,
	maxDelayMs: 128_000,
	backoffMultiplier: 2,
};

export const OpCode = {
	Dispatch: 0,
	Heartbeat: 1,
	Identify: 2,
	PresenceUpdate: 3,
	VoiceStateUpdate: 4,
	Resume: 6,
	Reconnect: 7,
	RequestGuildMembers: 8,
	InvalidSession: 9,
	Hello: 10,
	HeartbeatAck: 11,
} as const;
export type OpCode = (typeof OpCode)[keyof typeof OpCode];

export function opcodeName(op: number): string {
	for (const [name, value] of Object.entries(OpCode)) {
		if (value === op) {
			return name;
		}
	}
	return `Unknown(${op})`;
}

/**
 * Intent bits. Combine with `combineIntents`; privileged intents must
 * also be enabled on the application.
 */
export const GatewayIntents = {
	Guilds: 1 << 0,
	GuildMembers: 1 << 1,
	GuildModeration: 1 << 2,
	GuildEmojisAndStickers: 1 << 3,
	GuildIntegrations: 1 << 4,
	GuildWebhooks: 1 << 5,
	GuildInvites: 1 << 6,
	GuildVoiceStates: 1 << 7,
	GuildPresences: 1 << 8,
	GuildMessages: 1 << 9,
	GuildMessageReactions: 1 << 10,
	GuildMessageTyping: 1 << 11,
	DirectMessages: 1 << 12,
	DirectMessageReactions: 1 << 13,
	DirectMessageTyping: 1 << 14,
	MessageContent: 1 << 15,
	GuildScheduledEvents: 1 << 16,
	AutoModerationConfiguration: 1 << 20,
	AutoModerationExecution: 1 << 21,
} as const;

export function combineIntents(...intents: number[]): number {
	return intents.reduce((mask, intent) => mask | intent, 0);
}
