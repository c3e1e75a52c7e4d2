import { describe, expect, it } from "vitest";
import { classifyClose, closeCodeName } from "./close-codes.js";
import { ShardError } from "./errors.js";

describe("classifyClose", () => {
	it.each([4004, 4010, 4011, 4012, 4013, 4014])("treats %i as fatal", (code) => {
		expect(classifyClose(code)).toBe("fatal");
	});

	it.each([4007, 4009])("re-identifies after %i", (code) => {
		expect(classifyClose(code)).toBe("non_resumable");
	});

	it.each([1000, 1001, 1006, 4000, 4001, 4008, 4999])("resumes after %i", (code) => {
		expect(classifyClose(code)).toBe("resumable");
	});

	it("names known codes", () => {
		expect(closeCodeName(4004)).toBe("AuthenticationFailed");
		expect(closeCodeName(4321)).toBeUndefined();
	});
});

describe("ShardError", () => {
	it("carries the classification of a close", () => {
		const fatal = ShardError.serverClose({ code: 4014, reason: "Disallowed intent(s)." });
		const timedOut = ShardError.serverClose({ code: 4009, reason: "" });
		const unknown = ShardError.serverClose({ code: 4999, reason: "" });

		expect(fatal).toMatchObject({
			kind: "ServerClose",
			fatal: true,
			resumable: false,
			close: { code: 4014, reason: "Disallowed intent(s)." },
			message: "gateway closed the connection with 4014 (DisallowedIntents): Disallowed intent(s).",
		});
		expect(timedOut).toMatchObject({ fatal: false, resumable: false });
		expect(unknown).toMatchObject({
			fatal: false,
			resumable: true,
			message: "gateway closed the connection with 4999 (Unknown)",
		});
	});

	it("resumes after transport failures and heartbeat timeouts only", () => {
		expect(ShardError.io("reset").resumable).toBe(true);
		expect(ShardError.heartbeatTimeout().resumable).toBe(true);
		expect(ShardError.reconnectRequested().resumable).toBe(true);
		expect(ShardError.protocolViolation("bad").resumable).toBe(false);
		expect(ShardError.decompression(new Error("bad")).resumable).toBe(false);
		expect(ShardError.queueCancelled().resumable).toBe(false);
		expect(ShardError.invalidSession(true).resumable).toBe(true);
		expect(ShardError.invalidSession(false).resumable).toBe(false);
	});

	it("wraps foreign errors as transport failures", () => {
		const cause = new Error("socket hang up");
		const wrapped = ShardError.from(cause);

		expect(wrapped).toMatchObject({ kind: "Io", message: "socket hang up", cause });
		expect(ShardError.from(wrapped)).toBe(wrapped);
		expect(ShardError.from("text").message).toBe("text");
	});
});
