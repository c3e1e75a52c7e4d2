import { constants, createDeflate, deflateSync } from "node:zlib";
import { describe, expect, it } from "vitest";
import { ShardError } from "../errors.js";
import { Inflater, ZLIB_SUFFIX } from "./inflater.js";

/** Compresses each message onto one shared zlib stream, flushing after each. */
async function compressStream(messages: string[]): Promise<Buffer[]> {
	const deflate = createDeflate();
	let chunks: Buffer[] = [];
	deflate.on("data", (chunk: Buffer) => chunks.push(chunk));
	const frames: Buffer[] = [];
	for (const message of messages) {
		deflate.write(message);
		await new Promise<void>((resolve) => deflate.flush(constants.Z_SYNC_FLUSH, () => resolve()));
		frames.push(Buffer.concat(chunks));
		chunks = [];
	}
	deflate.destroy();
	return frames;
}

function compressOne(message: string): Buffer {
	return deflateSync(message, { finishFlush: constants.Z_SYNC_FLUSH });
}

describe("Inflater", () => {
	it("decodes a complete message", async () => {
		const inflater = new Inflater();
		const frame = compressOne('{"op":10,"d":{"heartbeat_interval":41250}}');

		const output = await inflater.feed(frame);

		expect(output?.toString("utf8")).toBe('{"op":10,"d":{"heartbeat_interval":41250}}');
		inflater.close();
	});

	it("ends every flushed frame with the suffix", () => {
		const frame = compressOne("hello");
		expect(frame.subarray(frame.length - 4)).toEqual(ZLIB_SUFFIX);
	});

	it("waits for the suffix before yielding", async () => {
		const inflater = new Inflater();
		const frame = compressOne('{"op":11}');
		const head = frame.subarray(0, 3);
		const tail = frame.subarray(3);

		expect(await inflater.feed(head)).toBeNull();
		const output = await inflater.feed(tail);

		expect(output?.toString("utf8")).toBe('{"op":11}');
		inflater.close();
	});

	it("yields the same bytes regardless of how the frame is split", async () => {
		const message = JSON.stringify({ op: 0, t: "MESSAGE_CREATE", s: 4, d: { content: "x".repeat(500) } });
		const frame = compressOne(message);

		for (const pieceSize of [1, 2, 7, frame.length]) {
			const inflater = new Inflater();
			const outputs: string[] = [];
			for (let offset = 0; offset < frame.length; offset += pieceSize) {
				const output = await inflater.feed(frame.subarray(offset, offset + pieceSize));
				if (output) {
					outputs.push(output.toString("utf8"));
				}
			}
			expect(outputs).toEqual([message]);
			inflater.close();
		}
	});

	it("keeps the context across messages on one stream", async () => {
		const messages = ['{"op":10,"d":{"heartbeat_interval":1000}}', '{"op":11}', '{"op":11}'];
		const frames = await compressStream(messages);
		const inflater = new Inflater();

		const outputs: string[] = [];
		for (const frame of frames) {
			const output = await inflater.feed(frame);
			outputs.push(output?.toString("utf8") ?? "");
		}

		expect(outputs).toEqual(messages);
		inflater.close();
	});

	it("treats an empty frame as a no-op", async () => {
		const inflater = new Inflater();

		expect(await inflater.feed(new Uint8Array(0))).toBeNull();
		expect(inflater.totalIn).toBe(0);
		inflater.close();
	});

	it("tracks bytes in and out", async () => {
		const inflater = new Inflater();
		const frame = compressOne("abcdef");

		await inflater.feed(frame);

		expect(inflater.totalIn).toBe(frame.length);
		expect(inflater.totalOut).toBe(6);
		inflater.close();
	});

	it("rejects malformed input with a decompression error", async () => {
		const inflater = new Inflater();
		const garbage = Buffer.concat([Buffer.from([0x12, 0x34, 0x56, 0x78]), ZLIB_SUFFIX]);

		const result = inflater.feed(garbage);

		await expect(result).rejects.toBeInstanceOf(ShardError);
		await expect(result).rejects.toMatchObject({ kind: "Decompression", resumable: false });
		inflater.close();
	});

	it("starts a fresh context after reset", async () => {
		const inflater = new Inflater();
		const [first] = await compressStream(['{"op":11}']);
		await inflater.feed(first ?? Buffer.alloc(0));

		inflater.reset();
		const output = await inflater.feed(compressOne('{"op":1}'));

		expect(output?.toString("utf8")).toBe('{"op":1}');
		expect(inflater.totalIn).toBe(compressOne('{"op":1}').length);
		inflater.close();
	});
});
