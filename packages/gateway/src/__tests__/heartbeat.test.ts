/**
 * Heartbeat supervision and reconnect timing
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createGatewayMetrics } from "../metrics/index.js";
import { updatePresence } from "../payloads.js";
import { Shard } from "../shard/index.js";
import { ShardId } from "../shard-id.js";
import { advanceUntil, FakeGatewayServer, nextEventOfType, TEST_TOKEN } from "./fixtures.js";

describe("Shard heartbeats", () => {
	let server: FakeGatewayServer;
	let shard: Shard;

	beforeEach(() => {
		vi.useFakeTimers();
		server = new FakeGatewayServer();
		shard = new Shard(ShardId.ONE, {
			token: TEST_TOKEN,
			intents: 1,
			socketFactory: server.factory,
			random: () => 0.5,
		});
	});

	afterEach(() => {
		shard.shutdown();
		vi.useRealTimers();
	});

	async function connect(heartbeatInterval: number) {
		shard.start();
		const socket = await server.nextSocket();
		socket.serverHello(heartbeatInterval);
		await socket.nextSent();
		socket.serverReady("abc", 1);
		await nextEventOfType(shard, "connected");
		return socket;
	}

	it("jitters the first heartbeat within the interval", async () => {
		const socket = await connect(1000);

		await vi.advanceTimersByTimeAsync(499);
		expect(socket.sent.map((payload) => payload.op)).toEqual([2]);

		await vi.advanceTimersByTimeAsync(1);
		expect(await socket.nextSent()).toEqual({ op: 1, d: 1 });
	});

	it("keeps heartbeating while acknowledged", async () => {
		const socket = await connect(1000);

		await vi.advanceTimersByTimeAsync(500);
		expect(await socket.nextSent()).toEqual({ op: 1, d: 1 });
		socket.serverSend({ op: 11 });
		const ack = await nextEventOfType(shard, "heartbeat_ack");
		expect(ack.latencyMs).toBe(0);

		socket.serverDispatch("GUILD_CREATE", 2, { id: "200" });
		await nextEventOfType(shard, "dispatch");
		expect(await advanceUntil(socket.nextSent())).toEqual({ op: 1, d: 2 });
		expect(shard.latency).toMatchObject({ heartbeats: 1, recent: [0], average: 0 });
	});

	it("reconnects and resumes when a heartbeat goes unacknowledged", async () => {
		const socket = await connect(1000);

		await vi.advanceTimersByTimeAsync(500);
		expect(await socket.nextSent()).toEqual({ op: 1, d: 1 });

		const disconnected = await advanceUntil(nextEventOfType(shard, "disconnected"));
		expect(disconnected).toEqual({ type: "disconnected", shardId: 0, code: null, reason: null, resumable: true });
		expect(socket.closedWith).toEqual({ code: 4000, reason: "HeartbeatTimeout" });

		const second = await server.nextSocket();
		second.serverHello(1000);
		expect(await second.nextSent()).toEqual({ op: 6, d: { token: TEST_TOKEN, session_id: "abc", seq: 1 } });
	});

	it("keeps reading and heartbeating while queued commands wait for capacity", async () => {
		const presence = updatePresence({ since: null, activities: [], status: "online", afk: false });
		for (let count = 0; count < 150; count += 1) {
			await shard.send(presence);
		}
		const socket = await connect(41_250);
		const sentOps = (op: number) => socket.sent.filter((payload) => payload.op === op).length;

		socket.serverDispatch("GUILD_CREATE", 2, { id: "200" });
		await vi.advanceTimersByTimeAsync(30_000);

		expect(sentOps(3)).toBe(118);
		expect(socket.sent.filter((payload) => payload.op === 1)).toEqual([{ op: 1, d: 2 }]);
		expect(shard.session?.sequence).toBe(2);
		expect(shard.stage).toBe("connected");

		socket.serverSend({ op: 11 });
		await vi.advanceTimersByTimeAsync(30_001);
		expect(sentOps(3)).toBe(150);
	});

	it("holds back a command whose socket closed while it waited for capacity", async () => {
		const presence = updatePresence({ since: null, activities: [], status: "idle", afk: false });
		const socket = await connect(41_250);
		for (let count = 0; count < 118; count += 1) {
			await shard.send(presence);
		}
		const waiting = shard.send(presence);

		socket.serverClose(4000, "unknown error");
		await expect(waiting).resolves.toBeUndefined();

		const second = await server.nextSocket();
		await vi.advanceTimersByTimeAsync(19_000);
		expect(second.sent).toEqual([]);

		second.serverHello(41_250);
		expect(await second.nextSent()).toEqual({ op: 6, d: { token: TEST_TOKEN, session_id: "abc", seq: 1 } });
		second.serverSend({ op: 0, t: "RESUMED", s: 2, d: {} });
		expect(await second.nextSent()).toEqual({ op: 3, d: presence.d });
	});

	it("answers a heartbeat request immediately", async () => {
		shard.start();
		const socket = await server.nextSocket();
		socket.serverHello(60_000);
		expect((await socket.nextSent()).op).toBe(2);

		socket.serverSend({ op: 1, d: null });

		expect(await socket.nextSent()).toEqual({ op: 1, d: null });
	});

	it("fails the handshake when hello does not arrive in time", async () => {
		shard = new Shard(ShardId.ONE, {
			token: TEST_TOKEN,
			intents: 1,
			socketFactory: server.factory,
			helloTimeoutMs: 1000,
		});
		shard.start();
		const first = await server.nextSocket();

		const disconnected = await advanceUntil(nextEventOfType(shard, "disconnected"));

		expect(disconnected.resumable).toBe(false);
		expect(first.closedWith).toEqual({ code: 1000, reason: "ProtocolViolation" });
		const second = await advanceUntil(server.nextSocket());
		expect(second.url).toBe("wss://gateway.discord.gg/?v=10&encoding=json");
		expect(server.connectAttempts).toBe(2);
	});
});

describe("Shard reconnect backoff", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("backs off exponentially while the socket fails to open", async () => {
		vi.useFakeTimers();
		const server = new FakeGatewayServer();
		const metrics = createGatewayMetrics();
		server.failNext = 2;
		const shard = new Shard(ShardId.ONE, {
			token: TEST_TOKEN,
			intents: 1,
			socketFactory: server.factory,
			metrics,
		});
		shard.start();

		const first = await nextEventOfType(shard, "reconnecting");
		expect(first.delayMs).toBe(1000);

		await vi.advanceTimersByTimeAsync(999);
		expect(server.connectAttempts).toBe(1);

		const second = await advanceUntil(nextEventOfType(shard, "reconnecting"));
		expect(second.delayMs).toBe(2000);
		expect(server.connectAttempts).toBe(2);

		const socket = await advanceUntil(server.nextSocket());
		expect(server.connectAttempts).toBe(3);
		expect((await metrics.reconnects.get()).values).toEqual([{ value: 2, labels: { shard: "0", reason: "Io" } }]);

		socket.serverHello();
		await socket.nextSent();
		socket.serverClose(4008, "rate limited");
		const limited = await nextEventOfType(shard, "reconnecting");
		expect(limited.delayMs).toBe(1000);

		shard.shutdown();
	});
});
