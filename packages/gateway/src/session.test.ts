import { describe, expect, it } from "vitest";
import { Session } from "./session.js";

describe("Session", () => {
	it("only moves the sequence forward", () => {
		const session = new Session("abc", 5, null);

		expect(session.setSequence(7)).toBe(5);
		expect(session.setSequence(6)).toBe(7);
		expect(session.sequence).toBe(7);
	});

	it("round-trips through its saved form", () => {
		const saved = { sessionId: "abc", sequence: 42, resumeUrl: "wss://resume.gateway.test" };

		const session = Session.from(saved);

		expect(session.id).toBe("abc");
		expect(session.toJSON()).toEqual(saved);
		expect(JSON.parse(JSON.stringify(session))).toEqual(saved);
	});
});
