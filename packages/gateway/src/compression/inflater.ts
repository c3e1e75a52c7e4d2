import { constants, createInflate, type Inflate } from "node:zlib";
import { ShardError } from "../errors.js";

/** Every complete zlib-stream message ends with a sync flush marker. */
export const ZLIB_SUFFIX = Buffer.from([0x00, 0x00, 0xff, 0xff]);

const INFLATE_CHUNK_SIZE = 64 * 1024;

function endsWithSuffix(buffer: Buffer): boolean {
	return buffer.length >= ZLIB_SUFFIX.length && buffer.subarray(buffer.length - ZLIB_SUFFIX.length).equals(ZLIB_SUFFIX);
}

/**
 * Per-socket decompressor for the `zlib-stream` transport. The inflate
 * context lives as long as the socket: messages reference earlier ones, so
 * it must be reset whenever a new socket is opened.
 */
export class Inflater {
	private stream: Inflate;
	private compressed: Buffer = Buffer.alloc(0);
	private output: Buffer[] = [];
	private failure: Error | null = null;
	private pending: ((error: Error) => void) | null = null;
	private bytesIn = 0;
	private bytesOut = 0;

	constructor() {
		this.stream = this.createStream();
	}

	get totalIn(): number {
		return this.bytesIn;
	}

	get totalOut(): number {
		return this.bytesOut;
	}

	/**
	 * Buffers a frame and, once the buffered input ends with the flush
	 * marker, returns the decompressed message. Returns null while a
	 * message is still incomplete.
	 */
	async feed(frame: Uint8Array): Promise<Buffer | null> {
		if (this.failure) {
			throw ShardError.decompression(this.failure);
		}
		if (frame.length === 0) {
			return null;
		}

		this.compressed = this.compressed.length === 0 ? Buffer.from(frame) : Buffer.concat([this.compressed, frame]);
		if (!endsWithSuffix(this.compressed)) {
			return null;
		}

		const input = this.compressed;
		this.compressed = Buffer.alloc(0);
		this.bytesIn += input.length;
		await this.write(input);

		const message = Buffer.concat(this.output);
		this.output = [];
		this.bytesOut += message.length;
		return message;
	}

	/** Discards the context; the next frame must start a new zlib stream. */
	reset(): void {
		this.stream.destroy();
		this.compressed = Buffer.alloc(0);
		this.output = [];
		this.failure = null;
		this.bytesIn = 0;
		this.bytesOut = 0;
		this.stream = this.createStream();
	}

	close(): void {
		this.pending?.(new Error("inflater closed"));
		this.pending = null;
		this.stream.destroy();
	}

	private write(input: Buffer): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			const fail = (error: Error) => {
				this.pending = null;
				reject(ShardError.decompression(error));
			};
			this.pending = fail;
			this.stream.write(input, (error) => {
				if (this.pending !== fail) {
					return;
				}
				if (error) {
					fail(error);
					return;
				}
				this.pending = null;
				resolve();
			});
		});
	}

	private createStream(): Inflate {
		const stream = createInflate({ flush: constants.Z_SYNC_FLUSH, chunkSize: INFLATE_CHUNK_SIZE });
		stream.on("data", (chunk: Buffer) => {
			this.output.push(chunk);
		});
		stream.on("error", (error: Error) => {
			this.failure = error;
			this.pending?.(error);
		});
		return stream;
	}
}
