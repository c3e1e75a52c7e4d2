import { createServer, type Server, type Socket } from "node:net";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import WebSocket, { WebSocketServer } from "ws";
import { ABNORMAL_CLOSURE, connectWebSocket, type GatewaySocket } from "./socket.js";

function portOf(address: ReturnType<Server["address"]>): number {
	if (address === null || typeof address === "string") {
		throw new Error("server is not listening on a TCP port");
	}
	return address.port;
}

describe("connectWebSocket", () => {
	let wss: WebSocketServer;
	let url: string;
	let client: GatewaySocket | null = null;

	beforeEach(async () => {
		wss = new WebSocketServer({ port: 0 });
		await new Promise<void>((resolve) => wss.once("listening", () => resolve()));
		url = `ws://127.0.0.1:${portOf(wss.address())}`;
	});

	afterEach(async () => {
		client?.close(1000, "done");
		client = null;
		for (const peer of wss.clients) {
			peer.terminate();
		}
		await new Promise<void>((resolve) => wss.close(() => resolve()));
	});

	async function connect(): Promise<{ socket: GatewaySocket; peer: WebSocket }> {
		const accepted = new Promise<WebSocket>((resolve) => wss.once("connection", resolve));
		const socket = await connectWebSocket(url, new AbortController().signal);
		client = socket;
		return { socket, peer: await accepted };
	}

	it("delivers text frames as strings and binary frames as buffers", async () => {
		const { socket, peer } = await connect();

		peer.send('{"op":11}');
		peer.send(Buffer.from([0x78, 0x9c]));

		expect(await socket.receive()).toEqual({ type: "message", data: '{"op":11}' });
		expect(await socket.receive()).toEqual({ type: "message", data: Buffer.from([0x78, 0x9c]) });
	});

	it("sends text to the server", async () => {
		const { socket, peer } = await connect();
		const received = new Promise<string>((resolve) => peer.once("message", (data) => resolve(data.toString())));

		await socket.send('{"op":1,"d":null}');

		expect(await received).toBe('{"op":1,"d":null}');
	});

	it("ends with the close frame and refuses to send afterwards", async () => {
		const { socket, peer } = await connect();

		peer.close(4000, "unknown error");

		expect(await socket.receive()).toEqual({ type: "close", code: 4000, reason: "unknown error" });
		expect(await socket.receive()).toEqual({
			type: "close",
			code: ABNORMAL_CLOSURE,
			reason: "socket already closed",
		});
		await expect(socket.send("{}")).rejects.toThrow("socket is not open (readyState 3)");
	});

	it("rejects when the signal is already aborted", async () => {
		await expect(connectWebSocket(url, AbortSignal.abort())).rejects.toThrow("connect aborted");
	});
});

describe("connectWebSocket handshake", () => {
	let server: Server;
	let port: number;
	const held: Socket[] = [];

	beforeEach(async () => {
		// Accepts the TCP connection but never answers the upgrade.
		server = createServer((socket) => {
			held.push(socket);
		});
		await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
		port = portOf(server.address());
	});

	afterEach(async () => {
		for (const socket of held.splice(0)) {
			socket.destroy();
		}
		await new Promise<void>((resolve) => server.close(() => resolve()));
	});

	it("gives up when aborted during the handshake", async () => {
		const controller = new AbortController();
		const connecting = connectWebSocket(`ws://127.0.0.1:${port}`, controller.signal);
		await new Promise<void>((resolve) => server.once("connection", () => resolve()));

		controller.abort();

		await expect(connecting).rejects.toThrow("connect aborted");
	});
});
