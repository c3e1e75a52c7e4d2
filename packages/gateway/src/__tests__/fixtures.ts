/**
 * Shared fixtures and helpers for shard and cluster tests
 */

import { constants, createDeflate } from "node:zlib";
import { vi } from "vitest";
import { EventChannel } from "../channel.js";
import { type GatewayEvent, type GatewayEventType, isEventType } from "../events.js";
import type { GatewaySocket, SocketFactory, SocketFrame } from "../socket.js";

export const TEST_TOKEN = "test-token";

/** A sent command as the server sees it. */
export interface SentPayload {
	op: number;
	d: unknown;
}

function isSentPayload(value: unknown): value is SentPayload {
	return typeof value === "object" && value !== null && "op" in value && typeof value.op === "number";
}

/**
 * In-process gateway socket. The test plays the server: it pushes frames
 * with `serverSend` / `serverClose` and reads what the shard sent with
 * `nextSent`.
 */
export class FakeGatewaySocket implements GatewaySocket {
	readonly sent: SentPayload[] = [];
	closedWith: { code: number; reason: string } | null = null;
	private readonly frames = new EventChannel<SocketFrame>();
	private readonly outbox = new EventChannel<SentPayload>();

	constructor(readonly url: string) {}

	async receive(): Promise<SocketFrame> {
		const result = await this.frames.next();
		return result.done ? { type: "close", code: 1006, reason: "" } : result.value;
	}

	async send(data: string): Promise<void> {
		if (this.closedWith) {
			throw new Error("socket is closed");
		}
		const payload: unknown = JSON.parse(data);
		if (!isSentPayload(payload)) {
			throw new Error(`shard sent a payload without an opcode: ${data}`);
		}
		this.sent.push(payload);
		this.outbox.push(payload);
	}

	close(code: number, reason: string): void {
		if (this.closedWith) {
			return;
		}
		this.closedWith = { code, reason };
		this.frames.close();
	}

	serverSend(payload: Record<string, unknown>): void {
		this.frames.push({ type: "message", data: JSON.stringify(payload) });
	}

	serverSendRaw(data: Buffer | string): void {
		this.frames.push({ type: "message", data });
	}

	serverHello(heartbeatInterval = 41_250): void {
		this.serverSend({ op: 10, d: { heartbeat_interval: heartbeatInterval }, s: null, t: null });
	}

	serverDispatch(name: string, sequence: number, data: unknown): void {
		this.serverSend({ op: 0, t: name, s: sequence, d: data });
	}

	serverReady(sessionId = "abc", sequence = 1, resumeUrl = "wss://resume.gateway.test"): void {
		this.serverDispatch("READY", sequence, {
			v: 10,
			session_id: sessionId,
			resume_gateway_url: resumeUrl,
			user: { id: "100", username: "shardline-bot", bot: true },
			guilds: [{ id: "200", unavailable: true }],
		});
	}

	serverClose(code: number, reason = ""): void {
		this.frames.push({ type: "close", code, reason });
		this.frames.close();
	}

	/** Resolves with the next payload the shard sends. */
	async nextSent(): Promise<SentPayload> {
		const result = await this.outbox.next();
		if (result.done) {
			throw new Error("outbox closed");
		}
		return result.value;
	}
}

/**
 * Socket factory that hands out fake sockets and lets the test wait for
 * each connection attempt.
 */
export class FakeGatewayServer {
	readonly sockets: FakeGatewaySocket[] = [];
	/** Number of upcoming connection attempts that fail to open */
	failNext = 0;
	private readonly accepted = new EventChannel<FakeGatewaySocket>();
	private attempts = 0;

	get connectAttempts(): number {
		return this.attempts;
	}

	readonly factory: SocketFactory = async (url) => {
		this.attempts += 1;
		if (this.failNext > 0) {
			this.failNext -= 1;
			throw new Error("connection refused");
		}
		const socket = new FakeGatewaySocket(url);
		this.sockets.push(socket);
		this.accepted.push(socket);
		return socket;
	};

	async nextSocket(): Promise<FakeGatewaySocket> {
		const result = await this.accepted.next();
		if (result.done) {
			throw new Error("server closed");
		}
		return result.value;
	}
}

export interface EventSource {
	nextEvent(): Promise<GatewayEvent | undefined>;
}

/** Reads events until one of the given type arrives. */
export async function nextEventOfType<T extends GatewayEventType>(
	source: EventSource,
	type: T
): Promise<Extract<GatewayEvent, { type: T }>> {
	for (;;) {
		const event = await source.nextEvent();
		if (!event) {
			throw new Error(`event stream ended before a ${type} event`);
		}
		if (isEventType(event, type)) {
			return event;
		}
	}
}

/** Reads every event up to and including the first of the given type. */
export async function eventsUntil(source: EventSource, type: GatewayEventType): Promise<GatewayEventType[]> {
	const seen: GatewayEventType[] = [];
	for (;;) {
		const event = await source.nextEvent();
		if (!event) {
			return seen;
		}
		seen.push(event.type);
		if (event.type === type) {
			return seen;
		}
	}
}

/** Reads events until the stream ends; rejects if the shard shut down with an error. */
export async function drainEvents(source: EventSource): Promise<GatewayEventType[]> {
	const seen: GatewayEventType[] = [];
	for (;;) {
		const event = await source.nextEvent();
		if (!event) {
			return seen;
		}
		seen.push(event.type);
	}
}

/**
 * Advances fake timers in steps until the promise settles. Use when the
 * code under test registers its timer at a point the test cannot observe.
 */
export async function advanceUntil<T>(promise: Promise<T>, stepMs = 100, maxSteps = 1000): Promise<T> {
	let settled = false;
	const mark = () => {
		settled = true;
	};
	void promise.then(mark, mark);
	for (let step = 0; step < maxSteps && !settled; step += 1) {
		await vi.advanceTimersByTimeAsync(stepMs);
	}
	return promise;
}

/**
 * Server side of a zlib-stream transport: every payload is written to one
 * deflate context and flushed, so each frame ends with the sync marker.
 */
export function createCompressor(): { compress(payload: Record<string, unknown>): Promise<Buffer>; close(): void } {
	const deflate = createDeflate();
	let chunks: Buffer[] = [];
	deflate.on("data", (chunk: Buffer) => chunks.push(chunk));

	return {
		async compress(payload) {
			deflate.write(JSON.stringify(payload));
			await new Promise<void>((resolve) => deflate.flush(constants.Z_SYNC_FLUSH, () => resolve()));
			const frame = Buffer.concat(chunks);
			chunks = [];
			return frame;
		},
		close() {
			deflate.destroy();
		},
	};
}
