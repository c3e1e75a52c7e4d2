/**
 * Gateway wire payloads
 *
 * Inbound frames are validated with zod before the shard acts on them;
 * outbound commands are validated before they are serialized.
 */

import { z } from "zod";
import { OpCode } from "./constants.js";

// ============================================
// Inbound
// ============================================

export const GatewayPayloadSchema = z.object({
	op: z.number().int(),
	d: z.unknown().optional(),
	s: z.number().int().nullable().optional(),
	t: z.string().nullable().optional(),
});
export type GatewayPayload = z.infer<typeof GatewayPayloadSchema>;

export const HelloSchema = z.object({
	heartbeat_interval: z.number().int().positive(),
});
export type Hello = z.infer<typeof HelloSchema>;

export const InvalidSessionSchema = z.boolean();

// ============================================
// Outbound
// ============================================

export const IdentifyPropertiesSchema = z.object({
	os: z.string(),
	browser: z.string(),
	device: z.string(),
});
export type IdentifyProperties = z.infer<typeof IdentifyPropertiesSchema>;

export const ActivitySchema = z.object({
	name: z.string().min(1),
	type: z.number().int().min(0).max(5),
	url: z.string().url().nullable().optional(),
	state: z.string().optional(),
});
export type Activity = z.infer<typeof ActivitySchema>;

export const PresenceStatusSchema = z.enum(["online", "dnd", "idle", "invisible", "offline"]);
export type PresenceStatus = z.infer<typeof PresenceStatusSchema>;

export const UpdatePresenceDataSchema = z.object({
	since: z.number().int().nullable(),
	activities: z.array(ActivitySchema),
	status: PresenceStatusSchema,
	afk: z.boolean(),
});
export type UpdatePresenceData = z.infer<typeof UpdatePresenceDataSchema>;

export const IdentifyDataSchema = z.object({
	token: z.string().min(1),
	intents: z.number().int().nonnegative(),
	shard: z.tuple([z.number().int().nonnegative(), z.number().int().positive()]),
	properties: IdentifyPropertiesSchema,
	compress: z.literal(false),
	large_threshold: z.number().int().min(50).max(250),
	presence: UpdatePresenceDataSchema.optional(),
});
export type IdentifyData = z.infer<typeof IdentifyDataSchema>;

export const ResumeDataSchema = z.object({
	token: z.string().min(1),
	session_id: z.string().min(1),
	seq: z.number().int().nonnegative(),
});
export type ResumeData = z.infer<typeof ResumeDataSchema>;

export const UpdateVoiceStateDataSchema = z.object({
	guild_id: z.string().min(1),
	channel_id: z.string().min(1).nullable(),
	self_mute: z.boolean(),
	self_deaf: z.boolean(),
});
export type UpdateVoiceStateData = z.infer<typeof UpdateVoiceStateDataSchema>;

export const RequestGuildMembersDataSchema = z
	.object({
		guild_id: z.string().min(1),
		query: z.string().optional(),
		limit: z.number().int().nonnegative(),
		presences: z.boolean().optional(),
		user_ids: z.array(z.string().min(1)).max(100).optional(),
		nonce: z.string().max(32).optional(),
	})
	.refine((data) => data.query !== undefined || data.user_ids !== undefined, {
		message: "either query or user_ids is required",
		path: ["query"],
	});
export type RequestGuildMembersData = z.infer<typeof RequestGuildMembersDataSchema>;

export const HeartbeatCommandSchema = z.object({
	op: z.literal(OpCode.Heartbeat),
	d: z.number().int().nonnegative().nullable(),
});
export const IdentifyCommandSchema = z.object({ op: z.literal(OpCode.Identify), d: IdentifyDataSchema });
export const ResumeCommandSchema = z.object({ op: z.literal(OpCode.Resume), d: ResumeDataSchema });
export const UpdatePresenceCommandSchema = z.object({
	op: z.literal(OpCode.PresenceUpdate),
	d: UpdatePresenceDataSchema,
});
export const UpdateVoiceStateCommandSchema = z.object({
	op: z.literal(OpCode.VoiceStateUpdate),
	d: UpdateVoiceStateDataSchema,
});
export const RequestGuildMembersCommandSchema = z.object({
	op: z.literal(OpCode.RequestGuildMembers),
	d: RequestGuildMembersDataSchema,
});

/** Commands a caller may send through a connected shard. */
export const UserCommandSchema = z.union([
	UpdatePresenceCommandSchema,
	UpdateVoiceStateCommandSchema,
	RequestGuildMembersCommandSchema,
]);
export type UserCommand = z.infer<typeof UserCommandSchema>;

export type HeartbeatCommand = z.infer<typeof HeartbeatCommandSchema>;
export type IdentifyCommand = z.infer<typeof IdentifyCommandSchema>;
export type ResumeCommand = z.infer<typeof ResumeCommandSchema>;
export type GatewayCommand = HeartbeatCommand | IdentifyCommand | ResumeCommand | UserCommand;

/** Every command a shard writes to the socket. */
export const GatewayCommandSchema = z.union([
	HeartbeatCommandSchema,
	IdentifyCommandSchema,
	ResumeCommandSchema,
	UserCommandSchema,
]);

export function describeCommandIssues(error: z.ZodError): string {
	return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}

// ============================================
// Command builders
// ============================================

export function createHeartbeatCommand(sequence: number | null): HeartbeatCommand {
	return { op: OpCode.Heartbeat, d: sequence };
}

export function createIdentifyCommand(data: IdentifyData): IdentifyCommand {
	return { op: OpCode.Identify, d: data };
}

export function createResumeCommand(token: string, sessionId: string, sequence: number): ResumeCommand {
	return { op: OpCode.Resume, d: { token, session_id: sessionId, seq: sequence } };
}

export function updatePresence(data: UpdatePresenceData): UserCommand {
	return { op: OpCode.PresenceUpdate, d: data };
}

export function updateVoiceState(data: UpdateVoiceStateData): UserCommand {
	return { op: OpCode.VoiceStateUpdate, d: data };
}

export function requestGuildMembers(data: RequestGuildMembersData): UserCommand {
	return { op: OpCode.RequestGuildMembers, d: data };
}

export function defaultIdentifyProperties(): IdentifyProperties {
	return { os: process.platform, browser: "shardline", device: "shardline" };
}
