/**
 * Gateway socket transport
 *
 * The shard talks to a small pull-based socket interface so it can race
 * inbound frames against its timers. The production implementation wraps
 * `ws`; tests substitute an in-process fake.
 */

import WebSocket from "ws";
import { EventChannel } from "./channel.js";
import { log } from "./logger.js";

export type SocketFrame =
	| { type: "message"; data: Buffer | string }
	| { type: "close"; code: number; reason: string };

export interface GatewaySocket {
	/** Next inbound frame; a close frame is always the last one. */
	receive(): Promise<SocketFrame>;
	send(data: string): Promise<void>;
	/** Idempotent */
	close(code: number, reason: string): void;
}

export type SocketFactory = (url: string, signal: AbortSignal) => Promise<GatewaySocket>;

/** Close code reported when the connection dropped without a close frame */
export const ABNORMAL_CLOSURE = 1006;

const HANDSHAKE_TIMEOUT_MS = 30_000;

function toBuffer(data: WebSocket.RawData): Buffer {
	if (Buffer.isBuffer(data)) {
		return data;
	}
	if (Array.isArray(data)) {
		return Buffer.concat(data);
	}
	return Buffer.from(data);
}

class WsGatewaySocket implements GatewaySocket {
	private readonly frames = new EventChannel<SocketFrame>();

	constructor(private readonly ws: WebSocket) {
		ws.on("message", (data, isBinary) => {
			const buffer = toBuffer(data);
			this.frames.push({ type: "message", data: isBinary ? buffer : buffer.toString("utf8") });
		});
		ws.on("close", (code, reason) => {
			this.frames.push({ type: "close", code, reason: reason.toString("utf8") });
			this.frames.close();
		});
		ws.on("error", (error) => {
			// A close event always follows.
			log.debug({ error: error.message }, "Gateway socket error");
		});
	}

	async receive(): Promise<SocketFrame> {
		const result = await this.frames.next();
		if (result.done) {
			return { type: "close", code: ABNORMAL_CLOSURE, reason: "socket already closed" };
		}
		return result.value;
	}

	send(data: string): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			if (this.ws.readyState !== WebSocket.OPEN) {
				reject(new Error(`socket is not open (readyState ${this.ws.readyState})`));
				return;
			}
			this.ws.send(data, (error) => {
				if (error) {
					reject(error);
				} else {
					resolve();
				}
			});
		});
	}

	close(code: number, reason: string): void {
		if (this.ws.readyState === WebSocket.OPEN) {
			this.ws.close(code, reason);
		} else if (this.ws.readyState === WebSocket.CONNECTING) {
			this.ws.terminate();
		}
	}
}

/**
 * Opens a gateway socket with `ws`. Per-message deflate is disabled; the
 * gateway's own zlib-stream transport is used instead.
 */
export const connectWebSocket: SocketFactory = (url, signal) =>
	new Promise<GatewaySocket>((resolve, reject) => {
		if (signal.aborted) {
			reject(new Error("connect aborted"));
			return;
		}

		const ws = new WebSocket(url, { perMessageDeflate: false, handshakeTimeout: HANDSHAKE_TIMEOUT_MS });

		const onAbort = () => {
			cleanup();
			ws.on("error", (error) => log.debug({ error: error.message }, "Aborted gateway socket error"));
			ws.terminate();
			reject(new Error("connect aborted"));
		};
		const onOpen = () => {
			cleanup();
			resolve(new WsGatewaySocket(ws));
		};
		const onError = (error: Error) => {
			cleanup();
			reject(error);
		};
		const cleanup = () => {
			signal.removeEventListener("abort", onAbort);
			ws.off("open", onOpen);
			ws.off("error", onError);
		};

		ws.on("open", onOpen);
		ws.on("error", onError);
		signal.addEventListener("abort", onAbort, { once: true });
	});
