/**
 * Gateway events
 *
 * Everything a shard yields: lifecycle pseudo-events, gateway control
 * events, raw payloads and decoded dispatches. Each event kind owns one
 * bit in EventTypeFlags so subscribers can filter cheaply.
 */

import { z } from "zod";

// ============================================
// Dispatch payloads
// ============================================

const UserSchema = z
	.object({
		id: z.string(),
		username: z.string(),
		bot: z.boolean().optional(),
	})
	.passthrough();

const UnavailableGuildSchema = z
	.object({
		id: z.string(),
		unavailable: z.boolean().optional(),
	})
	.passthrough();

export const ReadySchema = z
	.object({
		v: z.number().int().optional(),
		session_id: z.string().min(1),
		resume_gateway_url: z.string().url().optional(),
		user: UserSchema.optional(),
		guilds: z.array(UnavailableGuildSchema).optional(),
		shard: z.tuple([z.number().int(), z.number().int()]).optional(),
	})
	.passthrough();
export type Ready = z.infer<typeof ReadySchema>;

export const GuildCreateSchema = z
	.object({
		id: z.string(),
		name: z.string().optional(),
		unavailable: z.boolean().optional(),
		member_count: z.number().int().optional(),
	})
	.passthrough();
export type GuildCreate = z.infer<typeof GuildCreateSchema>;

export const GuildDeleteSchema = UnavailableGuildSchema;
export type GuildDelete = z.infer<typeof GuildDeleteSchema>;

export const MessageCreateSchema = z
	.object({
		id: z.string(),
		channel_id: z.string(),
		guild_id: z.string().optional(),
		content: z.string(),
		author: UserSchema,
	})
	.passthrough();
export type MessageCreate = z.infer<typeof MessageCreateSchema>;

export const MessageDeleteSchema = z
	.object({
		id: z.string(),
		channel_id: z.string(),
		guild_id: z.string().optional(),
	})
	.passthrough();
export type MessageDelete = z.infer<typeof MessageDeleteSchema>;

export const PresenceUpdateSchema = z
	.object({
		user: z.object({ id: z.string() }).passthrough(),
		guild_id: z.string().optional(),
		status: z.string(),
	})
	.passthrough();
export type PresenceUpdate = z.infer<typeof PresenceUpdateSchema>;

export const TypingStartSchema = z
	.object({
		channel_id: z.string(),
		guild_id: z.string().optional(),
		user_id: z.string(),
		timestamp: z.number().int(),
	})
	.passthrough();
export type TypingStart = z.infer<typeof TypingStartSchema>;

export const VoiceStateUpdateSchema = z
	.object({
		guild_id: z.string().optional(),
		channel_id: z.string().nullable(),
		user_id: z.string(),
		session_id: z.string(),
	})
	.passthrough();
export type VoiceStateUpdate = z.infer<typeof VoiceStateUpdateSchema>;

export type DispatchPayload =
	| { kind: "ready"; data: Ready }
	| { kind: "resumed"; data: unknown }
	| { kind: "guild_create"; data: GuildCreate }
	| { kind: "guild_delete"; data: GuildDelete }
	| { kind: "message_create"; data: MessageCreate }
	| { kind: "message_delete"; data: MessageDelete }
	| { kind: "presence_update"; data: PresenceUpdate }
	| { kind: "typing_start"; data: TypingStart }
	| { kind: "voice_state_update"; data: VoiceStateUpdate }
	| { kind: "unknown"; data: unknown; error?: string };

function unknownDispatch(data: unknown, error?: z.ZodError): DispatchPayload {
	if (!error) {
		return { kind: "unknown", data };
	}
	return { kind: "unknown", data, error: error.issues.map((issue) => issue.message).join("; ") };
}

/**
 * Decodes a dispatch body by event name. Names without a decoder, and known
 * names whose body fails validation, fall back to the `unknown` variant.
 */
export function decodeDispatch(name: string, data: unknown): DispatchPayload {
	switch (name) {
		case "READY": {
			const parsed = ReadySchema.safeParse(data);
			return parsed.success ? { kind: "ready", data: parsed.data } : unknownDispatch(data, parsed.error);
		}
		case "RESUMED":
			return { kind: "resumed", data };
		case "GUILD_CREATE": {
			const parsed = GuildCreateSchema.safeParse(data);
			return parsed.success ? { kind: "guild_create", data: parsed.data } : unknownDispatch(data, parsed.error);
		}
		case "GUILD_DELETE": {
			const parsed = GuildDeleteSchema.safeParse(data);
			return parsed.success ? { kind: "guild_delete", data: parsed.data } : unknownDispatch(data, parsed.error);
		}
		case "MESSAGE_CREATE": {
			const parsed = MessageCreateSchema.safeParse(data);
			return parsed.success ? { kind: "message_create", data: parsed.data } : unknownDispatch(data, parsed.error);
		}
		case "MESSAGE_DELETE": {
			const parsed = MessageDeleteSchema.safeParse(data);
			return parsed.success ? { kind: "message_delete", data: parsed.data } : unknownDispatch(data, parsed.error);
		}
		case "PRESENCE_UPDATE": {
			const parsed = PresenceUpdateSchema.safeParse(data);
			return parsed.success ? { kind: "presence_update", data: parsed.data } : unknownDispatch(data, parsed.error);
		}
		case "TYPING_START": {
			const parsed = TypingStartSchema.safeParse(data);
			return parsed.success ? { kind: "typing_start", data: parsed.data } : unknownDispatch(data, parsed.error);
		}
		case "VOICE_STATE_UPDATE": {
			const parsed = VoiceStateUpdateSchema.safeParse(data);
			return parsed.success
				? { kind: "voice_state_update", data: parsed.data }
				: unknownDispatch(data, parsed.error);
		}
		default:
			return unknownDispatch(data);
	}
}

// ============================================
// Events
// ============================================

export interface ConnectingEvent {
	type: "connecting";
	shardId: number;
	url: string;
}

export interface IdentifyingEvent {
	type: "identifying";
	shardId: number;
	shardTotal: number;
}

export interface ResumingEvent {
	type: "resuming";
	shardId: number;
	sessionId: string;
	sequence: number;
}

export interface ConnectedEvent {
	type: "connected";
	shardId: number;
	heartbeatInterval: number;
	resumed: boolean;
}

export interface DisconnectedEvent {
	type: "disconnected";
	shardId: number;
	code: number | null;
	reason: string | null;
	/** Whether the next connection attempt resumes the session */
	resumable: boolean;
}

export interface ReconnectingEvent {
	type: "reconnecting";
	shardId: number;
	delayMs: number;
}

export interface HelloEvent {
	type: "hello";
	shardId: number;
	heartbeatInterval: number;
}

export interface HeartbeatAckEvent {
	type: "heartbeat_ack";
	shardId: number;
	latencyMs: number | null;
}

export interface InvalidSessionEvent {
	type: "invalid_session";
	shardId: number;
	resumable: boolean;
}

export interface ReconnectRequestedEvent {
	type: "reconnect_requested";
	shardId: number;
}

export interface PayloadEvent {
	type: "payload";
	shardId: number;
	json: string;
}

export interface DispatchEvent {
	type: "dispatch";
	shardId: number;
	sequence: number | null;
	name: string;
	payload: DispatchPayload;
}

export type GatewayEvent =
	| ConnectingEvent
	| IdentifyingEvent
	| ResumingEvent
	| ConnectedEvent
	| DisconnectedEvent
	| ReconnectingEvent
	| HelloEvent
	| HeartbeatAckEvent
	| InvalidSessionEvent
	| ReconnectRequestedEvent
	| PayloadEvent
	| DispatchEvent;

export type GatewayEventType = GatewayEvent["type"];

export function isEventType<T extends GatewayEventType>(
	event: GatewayEvent,
	type: T
): event is Extract<GatewayEvent, { type: T }> {
	return event.type === type;
}

// ============================================
// Flags
// ============================================

export const EventTypeFlags = {
	SHARD_CONNECTING: 1n << 0n,
	SHARD_IDENTIFYING: 1n << 1n,
	SHARD_RESUMING: 1n << 2n,
	SHARD_CONNECTED: 1n << 3n,
	SHARD_DISCONNECTED: 1n << 4n,
	SHARD_RECONNECTING: 1n << 5n,
	SHARD_PAYLOAD: 1n << 6n,
	GATEWAY_HELLO: 1n << 7n,
	GATEWAY_HEARTBEAT_ACK: 1n << 8n,
	GATEWAY_INVALIDATE_SESSION: 1n << 9n,
	GATEWAY_RECONNECT: 1n << 10n,
	READY: 1n << 11n,
	RESUMED: 1n << 12n,
	GUILD_CREATE: 1n << 13n,
	GUILD_DELETE: 1n << 14n,
	MESSAGE_CREATE: 1n << 15n,
	MESSAGE_DELETE: 1n << 16n,
	PRESENCE_UPDATE: 1n << 17n,
	TYPING_START: 1n << 18n,
	VOICE_STATE_UPDATE: 1n << 19n,
	UNKNOWN_DISPATCH: 1n << 20n,
	/** Lifecycle pseudo-events, without the raw payload event */
	LIFECYCLE: (1n << 6n) - 1n,
	GATEWAY: (1n << 7n) | (1n << 8n) | (1n << 9n) | (1n << 10n),
	DISPATCH: ((1n << 21n) - 1n) & ~((1n << 11n) - 1n),
	ALL: (1n << 21n) - 1n,
} as const;

const DISPATCH_FLAGS: Record<DispatchPayload["kind"], bigint> = {
	ready: EventTypeFlags.READY,
	resumed: EventTypeFlags.RESUMED,
	guild_create: EventTypeFlags.GUILD_CREATE,
	guild_delete: EventTypeFlags.GUILD_DELETE,
	message_create: EventTypeFlags.MESSAGE_CREATE,
	message_delete: EventTypeFlags.MESSAGE_DELETE,
	presence_update: EventTypeFlags.PRESENCE_UPDATE,
	typing_start: EventTypeFlags.TYPING_START,
	voice_state_update: EventTypeFlags.VOICE_STATE_UPDATE,
	unknown: EventTypeFlags.UNKNOWN_DISPATCH,
};

const EVENT_FLAGS: Record<Exclude<GatewayEventType, "dispatch">, bigint> = {
	connecting: EventTypeFlags.SHARD_CONNECTING,
	identifying: EventTypeFlags.SHARD_IDENTIFYING,
	resuming: EventTypeFlags.SHARD_RESUMING,
	connected: EventTypeFlags.SHARD_CONNECTED,
	disconnected: EventTypeFlags.SHARD_DISCONNECTED,
	reconnecting: EventTypeFlags.SHARD_RECONNECTING,
	payload: EventTypeFlags.SHARD_PAYLOAD,
	hello: EventTypeFlags.GATEWAY_HELLO,
	heartbeat_ack: EventTypeFlags.GATEWAY_HEARTBEAT_ACK,
	invalid_session: EventTypeFlags.GATEWAY_INVALIDATE_SESSION,
	reconnect_requested: EventTypeFlags.GATEWAY_RECONNECT,
};

export function eventTypeFlag(event: GatewayEvent): bigint {
	if (event.type === "dispatch") {
		return DISPATCH_FLAGS[event.payload.kind];
	}
	return EVENT_FLAGS[event.type];
}

export function combineEventFlags(...flags: bigint[]): bigint {
	return flags.reduce((mask, flag) => mask | flag, 0n);
}
