/**
 * Gateway Shard
 *
 * One long-lived gateway connection: handshake, identify or resume,
 * steady-state event pump, heartbeat supervision, failure classification
 * and reconnect. Events are pulled with `nextEvent()` or async iteration.
 *
 * @see https://discord.com/developers/docs/topics/gateway#connection-lifecycle
 */

import { LARGE_THRESHOLD_MAXIMUM, LARGE_THRESHOLD_MINIMUM } from "@shardline/config";
import { type Logger, withShardContext } from "@shardline/logger";
import type { ZodError } from "zod";
import { EventChannel } from "../channel.js";
import { CloseCode } from "../close-codes.js";
import { Inflater } from "../compression/inflater.js";
import {
	DEFAULT_GATEWAY_URL,
	DEFAULT_HELLO_TIMEOUT_MS,
	DEFAULT_LARGE_THRESHOLD,
	DEFAULT_RECONNECT_CONFIG,
	OpCode,
	opcodeName,
} from "../constants.js";
import { ShardError } from "../errors.js";
import { decodeDispatch, EventTypeFlags, eventTypeFlag, type GatewayEvent } from "../events.js";
import { Heartbeater } from "../heartbeat.js";
import { Latency, type LatencySnapshot } from "../latency.js";
import type { ListenerRegistry } from "../listeners.js";
import { log as gatewayLog } from "../logger.js";
import {
	type GatewayMetrics,
	recordHeartbeatLatency,
	recordInflated,
	recordPayload,
	recordReconnect,
	setShardConnected,
} from "../metrics/index.js";
import {
	createHeartbeatCommand,
	createIdentifyCommand,
	createResumeCommand,
	defaultIdentifyProperties,
	describeCommandIssues,
	type GatewayCommand,
	GatewayCommandSchema,
	type GatewayPayload,
	GatewayPayloadSchema,
	type Hello,
	HelloSchema,
	type IdentifyProperties,
	InvalidSessionSchema,
	type UpdatePresenceData,
	type UserCommand,
	UserCommandSchema,
} from "../payloads.js";
import { type IdentifyOutcome, type IdentifyQueue, type IdentifyTicket, NoopIdentifyQueue } from "../queue/index.js";
import { CommandRatelimiter } from "../ratelimiter.js";
import { type ResumeSession, Session } from "../session.js";
import type { ShardId } from "../shard-id.js";
import { connectWebSocket, type GatewaySocket, type SocketFactory, type SocketFrame } from "../socket.js";
import { sleep } from "../throttle.js";
import { OutboundQueue } from "./outbound-queue.js";
import type { ReconnectConfig, ShardInfo, ShardOptions, ShardStage } from "./types.js";
import { buildGatewayUrl } from "./url.js";

/** What woke the connection loop up. */
type LoopSignal =
	| { kind: "frame"; frame: SocketFrame }
	| { kind: "heartbeat" }
	| { kind: "identify"; outcome: IdentifyOutcome }
	| { kind: "timeout" }
	| { kind: "shutdown" };

const DEFAULT_EVENT_TYPES = EventTypeFlags.ALL & ~EventTypeFlags.SHARD_PAYLOAD;

function invalidCommandMessage(error: ZodError): string {
	return `invalid gateway command: ${describeCommandIssues(error)}`;
}

export class Shard implements AsyncIterable<GatewayEvent> {
	private currentStage: ShardStage = "disconnected";
	private currentSession: Session | null;
	private socket: GatewaySocket | null = null;
	/** Aborted when the current socket is torn down. */
	private connection: AbortController | null = null;
	private inflater: Inflater | null = null;
	private heartbeater: Heartbeater | null = null;
	private ratelimiter: CommandRatelimiter | null = null;
	private identifyTicket: IdentifyTicket | null = null;
	private pendingFrame: Promise<LoopSignal> | null = null;
	private pendingTick: Promise<LoopSignal> | null = null;
	private pendingGrant: Promise<LoopSignal> | null = null;
	private connectFailures = 0;
	private running: Promise<void> | null = null;
	private draining: Promise<void> | null = null;
	private primaryReader: boolean;

	private readonly events = new EventChannel<GatewayEvent>();
	private readonly outbound = new OutboundQueue<UserCommand>();
	private readonly latencyTracker = new Latency();
	private readonly shutdownController = new AbortController();
	private readonly shutdownSignal: Promise<LoopSignal>;

	private readonly token: string;
	private readonly intents: number;
	private readonly gatewayUrl: string;
	private readonly compression: boolean;
	private readonly largeThreshold: number;
	private readonly identifyProperties: IdentifyProperties;
	private readonly presence: UpdatePresenceData | undefined;
	private readonly queue: IdentifyQueue;
	private readonly listeners: ListenerRegistry | undefined;
	private readonly eventTypes: bigint;
	private readonly helloTimeoutMs: number;
	private readonly ratelimitCommands: boolean;
	private readonly reconnect: ReconnectConfig;
	private readonly metrics: GatewayMetrics | undefined;
	private readonly socketFactory: SocketFactory;
	private readonly random: () => number;
	private readonly log: Logger;

	constructor(
		readonly id: ShardId,
		options: ShardOptions
	) {
		const largeThreshold = options.largeThreshold ?? DEFAULT_LARGE_THRESHOLD;
		if (
			!Number.isInteger(largeThreshold) ||
			largeThreshold < LARGE_THRESHOLD_MINIMUM ||
			largeThreshold > LARGE_THRESHOLD_MAXIMUM
		) {
			throw new RangeError(
				`largeThreshold must be an integer between ${LARGE_THRESHOLD_MINIMUM} and ${LARGE_THRESHOLD_MAXIMUM}, got ${largeThreshold}`
			);
		}
		const gatewayUrl = options.gatewayUrl ?? DEFAULT_GATEWAY_URL;
		// Throws on a malformed URL before anything connects.
		buildGatewayUrl(gatewayUrl, false);

		this.token = options.token;
		this.intents = options.intents;
		this.gatewayUrl = gatewayUrl;
		this.compression = options.compression ?? false;
		this.largeThreshold = largeThreshold;
		this.identifyProperties = options.identifyProperties ?? defaultIdentifyProperties();
		this.presence = options.presence;
		this.queue = options.queue ?? new NoopIdentifyQueue();
		this.listeners = options.listeners;
		// With listeners attached, the shard's own stream buffers only once something reads it.
		this.primaryReader = options.listeners === undefined;
		this.eventTypes = options.eventTypes ?? DEFAULT_EVENT_TYPES;
		this.helloTimeoutMs = options.helloTimeoutMs ?? DEFAULT_HELLO_TIMEOUT_MS;
		this.ratelimitCommands = options.ratelimitCommands ?? true;
		this.reconnect = {
			initialDelayMs: options.reconnect?.initialDelayMs ?? DEFAULT_RECONNECT_CONFIG.initialDelayMs,
			maxDelayMs: options.reconnect?.maxDelayMs ?? DEFAULT_RECONNECT_CONFIG.maxDelayMs,
			backoffMultiplier: options.reconnect?.backoffMultiplier ?? DEFAULT_RECONNECT_CONFIG.backoffMultiplier,
		};
		this.metrics = options.metrics;
		this.socketFactory = options.socketFactory ?? connectWebSocket;
		this.random = options.random ?? Math.random;
		this.log = withShardContext(options.logger ?? gatewayLog, { index: id.index, total: id.total });
		this.currentSession = options.session ? Session.from(options.session) : null;

		const signal = this.shutdownController.signal;
		this.shutdownSignal = new Promise<LoopSignal>((resolve) => {
			signal.addEventListener("abort", () => resolve({ kind: "shutdown" }), { once: true });
		});
	}

	// ============================================
	// Public API
	// ============================================

	get stage(): ShardStage {
		return this.currentStage;
	}

	get session(): Session | null {
		return this.currentSession;
	}

	get latency(): LatencySnapshot {
		return this.latencyTracker.snapshot();
	}

	info(): ShardInfo {
		return {
			id: this.id.index,
			total: this.id.total,
			stage: this.currentStage,
			session: this.currentSession?.toJSON() ?? null,
			latency: this.latencyTracker.snapshot(),
		};
	}

	/** Starts the connection task. Idempotent; `nextEvent()` calls it too. */
	start(): void {
		if (this.running || this.isShutDown()) {
			return;
		}
		this.running = this.run().catch((error: unknown) => {
			const failure = ShardError.from(error);
			this.log.error({ error: failure.message }, "Shard task failed");
			this.finish(CloseCode.Normal, "shard task failed", failure);
		});
	}

	/**
	 * Next event from this shard. Resolves `undefined` once the shard has
	 * shut down and every buffered event was read; rejects with the
	 * `ShardError` that shut it down, if one did.
	 */
	async nextEvent(): Promise<GatewayEvent | undefined> {
		this.primaryReader = true;
		this.start();
		const result = await this.events.next();
		return result.done ? undefined : result.value;
	}

	[Symbol.asyncIterator](): AsyncIterator<GatewayEvent, undefined> {
		this.primaryReader = true;
		this.start();
		return this.events[Symbol.asyncIterator]();
	}

	/**
	 * Sends a caller command. While the shard is not connected, or earlier
	 * commands are still waiting, the command is queued and sent in order
	 * once the connection has capacity. Resolves once sent or queued.
	 */
	async send(command: UserCommand): Promise<void> {
		const parsed = UserCommandSchema.safeParse(command);
		if (!parsed.success) {
			throw ShardError.invalidCommand(invalidCommandMessage(parsed.error));
		}
		if (this.isShutDown()) {
			throw ShardError.sending(new Error("shard is shut down"));
		}
		if (this.currentStage !== "connected" || this.draining !== null || this.outbound.size() > 0) {
			if (!this.outbound.enqueue(parsed.data)) {
				throw ShardError.sending(new Error("outbound queue is full"));
			}
			this.startDrain();
			return;
		}
		if (!(await this.sendUserCommand(parsed.data)) && this.isShutDown()) {
			throw ShardError.sending(new Error("shard shut down before the command was sent"));
		}
	}

	/** Closes the connection for good. The session is invalidated server-side. */
	shutdown(): void {
		this.finish(CloseCode.Normal, "shutting down", null);
	}

	/**
	 * Closes the connection without invalidating the session and returns it,
	 * so a later shard can resume where this one stopped.
	 */
	shutdownResumable(): ResumeSession | null {
		const session = this.currentSession?.toJSON() ?? null;
		this.finish(CloseCode.UnknownError, "shutting down to resume", null);
		return session;
	}

	// ============================================
	// Connection task
	// ============================================

	private async run(): Promise<void> {
		while (!this.isShutDown()) {
			try {
				await this.connectAndServe();
			} catch (error) {
				if (this.isShutDown()) {
					break;
				}
				await this.recover(ShardError.from(error));
			}
		}
	}

	private async connectAndServe(): Promise<void> {
		const url = buildGatewayUrl(this.currentSession?.resumeUrl ?? this.gatewayUrl, this.compression);
		this.transition("connecting");
		this.emit({ type: "connecting", shardId: this.id.index, url });

		let socket: GatewaySocket;
		try {
			socket = await this.socketFactory(url, this.shutdownController.signal);
		} catch (error) {
			throw ShardError.io(`failed to connect to ${url}`, error);
		}
		if (this.isShutDown()) {
			socket.close(CloseCode.Normal, "shutting down");
			return;
		}
		this.socket = socket;
		this.connection = new AbortController();
		this.inflater = this.compression ? new Inflater() : null;

		this.transition("waiting_for_hello");
		const hello = await this.waitForHello();
		if (!hello) {
			return;
		}
		this.connectFailures = 0;
		this.heartbeater = new Heartbeater(hello.heartbeat_interval, this.random);
		this.ratelimiter = this.ratelimitCommands ? new CommandRatelimiter(hello.heartbeat_interval) : null;
		this.emit({ type: "hello", shardId: this.id.index, heartbeatInterval: hello.heartbeat_interval });
		this.log.debug({ heartbeatInterval: hello.heartbeat_interval }, "Received hello");

		if (this.currentSession) {
			await this.beginResume(this.currentSession);
		} else {
			this.beginIdentify();
		}
		await this.serve();
	}

	private async waitForHello(): Promise<Hello | null> {
		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeout = new Promise<LoopSignal>((resolve) => {
			timer = setTimeout(() => resolve({ kind: "timeout" }), this.helloTimeoutMs);
		});

		try {
			for (;;) {
				const signal = await this.nextSignal(timeout);
				if (signal.kind === "shutdown") {
					return null;
				}
				if (signal.kind === "timeout") {
					throw ShardError.protocolViolation(`no hello within ${this.helloTimeoutMs}ms`);
				}
				if (signal.kind !== "frame") {
					continue;
				}
				if (signal.frame.type === "close") {
					throw this.closeError(signal.frame);
				}
				const json = await this.decodeFrame(signal.frame.data);
				if (json === null) {
					continue;
				}
				const payload = this.parsePayload(json);
				if (!payload || payload.op !== OpCode.Hello) {
					const received = payload ? opcodeName(payload.op) : "an unreadable payload";
					throw ShardError.protocolViolation(`expected hello as the first payload, received ${received}`);
				}
				const hello = HelloSchema.safeParse(payload.d);
				if (!hello.success) {
					throw ShardError.protocolViolation("hello payload has no valid heartbeat_interval");
				}
				return hello.data;
			}
		} finally {
			clearTimeout(timer);
		}
	}

	private async serve(): Promise<void> {
		for (;;) {
			const signal = await this.nextSignal();
			switch (signal.kind) {
				case "shutdown":
					return;
				case "frame":
					await this.handleFrame(signal.frame);
					break;
				case "heartbeat":
					await this.heartbeatTick();
					break;
				case "identify":
					this.identifyTicket = null;
					if (signal.outcome === "cancelled") {
						if (this.isShutDown()) {
							return;
						}
						throw ShardError.queueCancelled();
					}
					await this.sendIdentify();
					break;
				case "timeout":
					break;
			}
		}
	}

	/**
	 * Waits for whichever comes first: an inbound frame, a heartbeat tick,
	 * the identify grant, an optional deadline, or shutdown. Promises that
	 * lose the race are kept for the next call so no frame is dropped.
	 */
	private async nextSignal(deadline?: Promise<LoopSignal>): Promise<LoopSignal> {
		if (this.isShutDown()) {
			return { kind: "shutdown" };
		}
		const socket = this.socket;
		if (!socket) {
			throw ShardError.io("socket is not open");
		}

		this.pendingFrame ??= socket.receive().then((frame): LoopSignal => ({ kind: "frame", frame }));
		const contenders = [this.shutdownSignal, this.pendingFrame];
		if (this.heartbeater) {
			this.pendingTick ??= this.heartbeater.throttle.next().then((): LoopSignal => ({ kind: "heartbeat" }));
			contenders.push(this.pendingTick);
		}
		if (this.pendingGrant) {
			contenders.push(this.pendingGrant);
		}
		if (deadline) {
			contenders.push(deadline);
		}

		const signal = await Promise.race(contenders);
		if (signal.kind === "frame") {
			this.pendingFrame = null;
		} else if (signal.kind === "heartbeat") {
			this.pendingTick = null;
		} else if (signal.kind === "identify") {
			this.pendingGrant = null;
		}
		return signal;
	}

	// ============================================
	// Handshake
	// ============================================

	private beginIdentify(): void {
		this.transition("identifying");
		this.emit({ type: "identifying", shardId: this.id.index, shardTotal: this.id.total });
		const ticket = this.queue.enqueue(this.id.index, this.shutdownController.signal);
		this.identifyTicket = ticket;
		this.pendingGrant = ticket.granted.then((outcome): LoopSignal => ({ kind: "identify", outcome }));
	}

	private async sendIdentify(): Promise<void> {
		this.log.info({ intents: this.intents }, "Identifying");
		await this.sendCommand(
			createIdentifyCommand({
				token: this.token,
				intents: this.intents,
				shard: this.id.toArray(),
				properties: this.identifyProperties,
				compress: false,
				large_threshold: this.largeThreshold,
				presence: this.presence,
			})
		);
	}

	private async beginResume(session: Session): Promise<void> {
		this.transition("resuming");
		this.emit({ type: "resuming", shardId: this.id.index, sessionId: session.id, sequence: session.sequence });
		this.log.info({ sessionId: session.id, sequence: session.sequence }, "Resuming session");
		await this.sendCommand(createResumeCommand(this.token, session.id, session.sequence));
	}

	private markConnected(resumed: boolean): void {
		this.transition("connected");
		this.emit({
			type: "connected",
			shardId: this.id.index,
			heartbeatInterval: this.heartbeater?.intervalMs ?? 0,
			resumed,
		});
		if (this.metrics) {
			setShardConnected(this.metrics, this.id.index, true);
		}
		this.log.info({ sessionId: this.currentSession?.id, resumed }, resumed ? "Session resumed" : "Session ready");
		this.startDrain();
	}

	// ============================================
	// Inbound
	// ============================================

	private async handleFrame(frame: SocketFrame): Promise<void> {
		if (frame.type === "close") {
			throw this.closeError(frame);
		}
		const json = await this.decodeFrame(frame.data);
		if (json === null) {
			return;
		}
		const payload = this.parsePayload(json);
		if (payload) {
			await this.processPayload(payload);
		}
	}

	/** Returns the JSON text of a complete payload, or null while a compressed one is partial. */
	private async decodeFrame(data: Buffer | string): Promise<string | null> {
		let json: string;
		if (typeof data === "string") {
			json = data;
		} else if (this.inflater) {
			const bytesIn = this.inflater.totalIn;
			const inflated = await this.inflater.feed(data);
			if (!inflated) {
				return null;
			}
			if (this.metrics) {
				recordInflated(this.metrics, this.id.index, this.inflater.totalIn - bytesIn, inflated.length);
			}
			json = inflated.toString("utf8");
		} else {
			json = data.toString("utf8");
		}

		this.log.trace({ bytes: json.length }, "Received payload");
		if (this.wantsPayloads()) {
			this.emit({ type: "payload", shardId: this.id.index, json });
		}
		return json;
	}

	private parsePayload(json: string): GatewayPayload | null {
		let value: unknown;
		try {
			value = JSON.parse(json);
		} catch (error) {
			this.log.warn(
				{ error: error instanceof Error ? error.message : String(error), bytes: json.length },
				"Skipping payload that is not valid JSON"
			);
			return null;
		}
		const parsed = GatewayPayloadSchema.safeParse(value);
		if (!parsed.success) {
			this.log.warn({ issues: parsed.error.issues.length }, "Skipping payload without a valid envelope");
			return null;
		}
		return parsed.data;
	}

	private async processPayload(payload: GatewayPayload): Promise<void> {
		if (this.metrics) {
			recordPayload(this.metrics, this.id.index, opcodeName(payload.op));
		}
		if (typeof payload.s === "number" && this.currentSession) {
			this.currentSession.setSequence(payload.s);
		}

		switch (payload.op) {
			case OpCode.Dispatch:
				await this.processDispatch(payload);
				return;
			case OpCode.Heartbeat:
				await this.sendHeartbeat();
				return;
			case OpCode.HeartbeatAck:
				this.acknowledgeHeartbeat();
				return;
			case OpCode.Reconnect:
				this.emit({ type: "reconnect_requested", shardId: this.id.index });
				throw ShardError.reconnectRequested();
			case OpCode.InvalidSession: {
				const parsed = InvalidSessionSchema.safeParse(payload.d);
				const resumable = parsed.success && parsed.data;
				this.emit({ type: "invalid_session", shardId: this.id.index, resumable });
				throw ShardError.invalidSession(resumable);
			}
			case OpCode.Hello:
				throw ShardError.protocolViolation("received a second hello on the same socket");
			default:
				this.log.warn({ op: payload.op }, "Ignoring payload with unknown opcode");
		}
	}

	private async processDispatch(payload: GatewayPayload): Promise<void> {
		const name = payload.t ?? "";
		const sequence = payload.s ?? null;
		const decoded = decodeDispatch(name, payload.d);

		if (name === "READY") {
			if (decoded.kind !== "ready") {
				throw ShardError.protocolViolation(`malformed READY payload: ${decoded.kind === "unknown" ? decoded.error : ""}`);
			}
			this.currentSession = new Session(
				decoded.data.session_id,
				sequence ?? 0,
				decoded.data.resume_gateway_url ?? null
			);
			this.markConnected(false);
		} else if (name === "RESUMED") {
			this.markConnected(true);
		} else if (decoded.kind === "unknown" && decoded.error) {
			this.log.warn({ event: name, error: decoded.error }, "Dispatch failed validation");
		}

		this.emit({ type: "dispatch", shardId: this.id.index, sequence, name, payload: decoded });
	}

	// ============================================
	// Heartbeats
	// ============================================

	private async heartbeatTick(): Promise<void> {
		if (this.heartbeater?.tick() === "zombied") {
			throw ShardError.heartbeatTimeout();
		}
		await this.sendHeartbeat();
	}

	private async sendHeartbeat(): Promise<void> {
		// Marked before the write so an ack racing the send callback is not lost.
		this.heartbeater?.markSent();
		this.latencyTracker.trackSent();
		await this.sendCommand(createHeartbeatCommand(this.currentSession?.sequence ?? null));
	}

	private acknowledgeHeartbeat(): void {
		const latencyMs = this.latencyTracker.trackReceived();
		this.heartbeater?.acknowledge();
		if (latencyMs !== null && this.metrics) {
			recordHeartbeatLatency(this.metrics, this.id.index, latencyMs);
		}
		this.log.trace({ latencyMs }, "Heartbeat acknowledged");
		this.emit({ type: "heartbeat_ack", shardId: this.id.index, latencyMs });
	}

	// ============================================
	// Outbound
	// ============================================

	/**
	 * Sends queued commands off the connection loop, so waiting for
	 * ratelimit capacity never holds up reads or heartbeats.
	 */
	private startDrain(): void {
		if (this.draining !== null || this.currentStage !== "connected" || this.outbound.size() === 0) {
			return;
		}
		this.draining = this.drainOutbound().then(
			() => {
				this.draining = null;
				// Commands queued while the last one was in flight.
				this.startDrain();
			},
			(error: unknown) => {
				this.draining = null;
				this.log.warn({ error: ShardError.from(error).message }, "Stopped sending queued commands");
			}
		);
	}

	private async drainOutbound(): Promise<void> {
		while (this.currentStage === "connected") {
			const command = this.outbound.shift();
			if (command === undefined) {
				return;
			}
			try {
				await this.sendUserCommand(command);
			} catch (error) {
				this.requeue(command);
				throw error;
			}
		}
	}

	/**
	 * Sends on the socket that was current when the call started. Returns
	 * false, with the command back at the front of the queue, when that
	 * socket went away while waiting for capacity.
	 */
	private async sendUserCommand(command: UserCommand): Promise<boolean> {
		const socket = this.socket;
		const connection = this.connection;
		if (!socket || !connection || this.currentStage !== "connected") {
			this.requeue(command);
			return false;
		}
		if (this.ratelimiter && !(await this.ratelimiter.acquire(connection.signal))) {
			this.requeue(command);
			return false;
		}
		if (this.socket !== socket || this.currentStage !== "connected") {
			this.requeue(command);
			return false;
		}
		await this.sendCommand(command, socket);
		return true;
	}

	private requeue(command: UserCommand): void {
		if (this.isShutDown()) {
			return;
		}
		this.outbound.requeue(command);
		this.startDrain();
	}

	private async sendCommand(command: GatewayCommand, socket = this.socket): Promise<void> {
		if (!socket) {
			throw ShardError.sending(new Error("socket is not open"));
		}
		const parsed = GatewayCommandSchema.safeParse(command);
		if (!parsed.success) {
			throw ShardError.invalidCommand(invalidCommandMessage(parsed.error), true);
		}
		const data = JSON.stringify(parsed.data);
		try {
			await socket.send(data);
		} catch (error) {
			throw ShardError.sending(error);
		}
		this.log.trace({ op: opcodeName(command.op), bytes: data.length }, "Sent command");
	}

	// ============================================
	// Failure handling
	// ============================================

	private async recover(failure: ShardError): Promise<void> {
		const previous = this.currentStage;
		if (failure.fatal) {
			this.log.error({ error: failure.message, code: failure.close?.code }, "Fatal gateway failure");
			this.finish(CloseCode.Normal, "fatal gateway failure", failure);
			return;
		}

		// Anything that goes wrong while resuming means the session is gone.
		const keepSession = failure.resumable && previous !== "resuming" && this.currentSession !== null;
		if (!keepSession) {
			this.currentSession = null;
		}
		this.teardown(keepSession ? CloseCode.UnknownError : CloseCode.Normal, failure.kind);
		if (this.metrics) {
			setShardConnected(this.metrics, this.id.index, false);
			recordReconnect(this.metrics, this.id.index, failure.kind);
		}

		this.transition("disconnected");
		this.emit({
			type: "disconnected",
			shardId: this.id.index,
			code: failure.close?.code ?? null,
			reason: failure.close?.reason ?? null,
			resumable: keepSession,
		});
		this.log.warn({ kind: failure.kind, error: failure.message, resumable: keepSession }, "Shard disconnected");

		const delayMs = this.reconnectDelay(failure, previous);
		this.transition("reconnecting");
		this.emit({ type: "reconnecting", shardId: this.id.index, delayMs });
		if (delayMs > 0) {
			await sleep(delayMs, this.shutdownController.signal);
		}
	}

	/** Backoff applies to sockets that failed to open and to rate-limited closes. */
	private reconnectDelay(failure: ShardError, previous: ShardStage): number {
		const rateLimited = failure.close?.code === CloseCode.RateLimited;
		const connectFailed = failure.kind === "Io" && previous === "connecting";
		if (!rateLimited && !connectFailed) {
			return 0;
		}
		this.connectFailures += 1;
		const { initialDelayMs, backoffMultiplier, maxDelayMs } = this.reconnect;
		return Math.min(initialDelayMs * backoffMultiplier ** (this.connectFailures - 1), maxDelayMs);
	}

	private closeError(frame: { code: number; reason: string }): ShardError {
		return ShardError.serverClose({ code: frame.code, reason: frame.reason });
	}

	private finish(code: number, reason: string, failure: ShardError | null): void {
		if (this.isShutDown()) {
			return;
		}
		const resumable = failure === null && code !== CloseCode.Normal && this.currentSession !== null;
		this.transition("shut_down");
		this.shutdownController.abort();
		this.teardown(code, reason);
		this.outbound.clear();
		if (this.metrics) {
			setShardConnected(this.metrics, this.id.index, false);
		}
		this.emit({
			type: "disconnected",
			shardId: this.id.index,
			code: failure?.close?.code ?? code,
			reason: failure?.close?.reason ?? reason,
			resumable,
		});
		this.log.info({ code, resumable }, "Shard shut down");
		this.events.close(failure ?? undefined);
	}

	private teardown(code: number, reason: string): void {
		this.heartbeater?.stop();
		this.heartbeater = null;
		this.ratelimiter = null;
		this.identifyTicket?.cancel();
		this.identifyTicket = null;
		this.pendingFrame = null;
		this.pendingTick = null;
		this.pendingGrant = null;
		if (this.inflater) {
			this.log.trace(
				{ bytesIn: this.inflater.totalIn, bytesOut: this.inflater.totalOut },
				"Closing inflater"
			);
			this.inflater.close();
			this.inflater = null;
		}
		this.connection?.abort();
		this.connection = null;
		this.socket?.close(code, reason);
		this.socket = null;
	}

	// ============================================
	// Helpers
	// ============================================

	private isShutDown(): boolean {
		return this.currentStage === "shut_down";
	}

	private transition(stage: ShardStage): void {
		if (this.currentStage === stage) {
			return;
		}
		this.log.debug({ from: this.currentStage, to: stage }, "Stage changed");
		this.currentStage = stage;
	}

	private emit(event: GatewayEvent): void {
		if (this.primaryReader && (this.eventTypes & eventTypeFlag(event)) !== 0n) {
			this.events.push(event);
		}
		this.listeners?.publish(event);
	}

	private wantsPayloads(): boolean {
		return (
			(this.primaryReader && (this.eventTypes & EventTypeFlags.SHARD_PAYLOAD) !== 0n) ||
			(this.listeners?.wants(EventTypeFlags.SHARD_PAYLOAD) ?? false)
		);
	}
}
