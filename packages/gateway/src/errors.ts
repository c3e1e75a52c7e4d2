import { type CloseInfo, classifyClose, closeCodeName } from "./close-codes.js";

export type ShardErrorKind =
	| "Io"
	| "ProtocolViolation"
	| "Decompression"
	| "ServerClose"
	| "HeartbeatTimeout"
	| "QueueCancelled"
	| "ReconnectRequested"
	| "InvalidSession"
	| "Sending"
	| "InvalidCommand";

export interface ShardErrorOptions {
	cause?: unknown;
	resumable?: boolean;
	fatal?: boolean;
	close?: CloseInfo;
}

const RESUMABLE_BY_KIND: Record<ShardErrorKind, boolean> = {
	Io: true,
	ProtocolViolation: false,
	Decompression: false,
	ServerClose: true,
	HeartbeatTimeout: true,
	QueueCancelled: false,
	ReconnectRequested: true,
	InvalidSession: false,
	Sending: true,
	InvalidCommand: false,
};

/**
 * Failure of a single shard connection. Every error the shard task sees is
 * normalized into one of these before it decides whether to resume,
 * re-identify or shut down.
 */
export class ShardError extends Error {
	readonly resumable: boolean;
	readonly fatal: boolean;
	readonly close: CloseInfo | null;

	constructor(
		message: string,
		public readonly kind: ShardErrorKind,
		options: ShardErrorOptions = {}
	) {
		super(message, { cause: options.cause });
		this.name = "ShardError";
		this.fatal = options.fatal ?? false;
		this.resumable = !this.fatal && (options.resumable ?? RESUMABLE_BY_KIND[kind]);
		this.close = options.close ?? null;
	}

	static io(message: string, cause?: unknown): ShardError {
		return new ShardError(message, "Io", { cause });
	}

	static protocolViolation(message: string): ShardError {
		return new ShardError(message, "ProtocolViolation");
	}

	static decompression(cause: unknown): ShardError {
		return new ShardError("failed to inflate gateway frame", "Decompression", { cause });
	}

	static serverClose(close: CloseInfo): ShardError {
		const classification = classifyClose(close.code);
		const name = closeCodeName(close.code) ?? "Unknown";
		const reason = close.reason ? `: ${close.reason}` : "";
		return new ShardError(`gateway closed the connection with ${close.code} (${name})${reason}`, "ServerClose", {
			close,
			resumable: classification === "resumable",
			fatal: classification === "fatal",
		});
	}

	static heartbeatTimeout(): ShardError {
		return new ShardError("heartbeat was not acknowledged before the next tick", "HeartbeatTimeout");
	}

	static queueCancelled(): ShardError {
		return new ShardError("identify wait was cancelled", "QueueCancelled");
	}

	static reconnectRequested(): ShardError {
		return new ShardError("gateway requested a reconnect", "ReconnectRequested");
	}

	static invalidSession(resumable: boolean): ShardError {
		return new ShardError(`gateway invalidated the session (resumable: ${resumable})`, "InvalidSession", {
			resumable,
		});
	}

	static sending(cause: unknown): ShardError {
		return new ShardError("failed to send gateway command", "Sending", { cause });
	}

	/** Fatal when the shard itself built the command, since retrying would build it again. */
	static invalidCommand(message: string, fatal = false): ShardError {
		return new ShardError(message, "InvalidCommand", { fatal });
	}

	static from(error: unknown): ShardError {
		if (error instanceof ShardError) {
			return error;
		}
		const message = error instanceof Error ? error.message : String(error);
		return ShardError.io(message, error);
	}
}

export type ShardIdErrorCode = "INDEX_OUT_OF_RANGE" | "TOTAL_NOT_POSITIVE" | "NOT_AN_INTEGER";

export class ShardIdError extends Error {
	constructor(
		message: string,
		public readonly code: ShardIdErrorCode
	) {
		super(message);
		this.name = "ShardIdError";
	}
}

export type ShardSchemeErrorCode = "ID_TOO_LARGE" | "BUCKET_TOO_LARGE" | "EMPTY_RANGE" | "INVALID_TOTAL";

export class ShardSchemeError extends Error {
	constructor(
		message: string,
		public readonly code: ShardSchemeErrorCode
	) {
		super(message);
		this.name = "ShardSchemeError";
	}
}

export class GatewayInfoError extends Error {
	constructor(
		message: string,
		public readonly status: number | null,
		public override readonly cause?: unknown
	) {
		super(message, { cause });
		this.name = "GatewayInfoError";
	}
}
