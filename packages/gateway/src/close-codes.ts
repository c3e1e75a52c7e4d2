/**
 * Gateway close codes and their reconnect classification.
 */

export const CloseCode = {
	Normal: 1000,
	GoingAway: 1001,
	UnknownError: 4000,
	UnknownOpcode: 4001,
	DecodeError: 4002,
	NotAuthenticated: 4003,
	AuthenticationFailed: 4004,
	AlreadyAuthenticated: 4005,
	InvalidSequence: 4007,
	RateLimited: 4008,
	SessionTimedOut: 4009,
	InvalidShard: 4010,
	ShardingRequired: 4011,
	InvalidApiVersion: 4012,
	InvalidIntents: 4013,
	DisallowedIntents: 4014,
} as const;
export type CloseCode = (typeof CloseCode)[keyof typeof CloseCode];

export interface CloseInfo {
	code: number;
	reason: string;
}

/**
 * - resumable: reconnect and resume the session
 * - non_resumable: reconnect and identify from scratch
 * - fatal: shut the shard down
 */
export type CloseClassification = "resumable" | "non_resumable" | "fatal";

const FATAL_CLOSE_CODES: ReadonlySet<number> = new Set([
	CloseCode.AuthenticationFailed,
	CloseCode.InvalidShard,
	CloseCode.ShardingRequired,
	CloseCode.InvalidApiVersion,
	CloseCode.InvalidIntents,
	CloseCode.DisallowedIntents,
]);

const NON_RESUMABLE_CLOSE_CODES: ReadonlySet<number> = new Set([
	CloseCode.InvalidSequence,
	CloseCode.SessionTimedOut,
]);

export function classifyClose(code: number): CloseClassification {
	if (FATAL_CLOSE_CODES.has(code)) {
		return "fatal";
	}
	if (NON_RESUMABLE_CLOSE_CODES.has(code)) {
		return "non_resumable";
	}
	return "resumable";
}

export function closeCodeName(code: number): string | undefined {
	for (const [name, value] of Object.entries(CloseCode)) {
		if (value === code) {
			return name;
		}
	}
	return undefined;
}
