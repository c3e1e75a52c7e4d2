import { describe, expect, it } from "vitest";
import { Latency } from "./latency.js";

describe("Latency", () => {
	it("ignores an acknowledgement with no heartbeat outstanding", () => {
		const latency = new Latency();

		expect(latency.trackReceived(50)).toBeNull();
		expect(latency.snapshot()).toEqual({ average: null, heartbeats: 0, recent: [], sent: null, received: 50 });
	});

	it("keeps the five most recent round trips, newest first", () => {
		const latency = new Latency();
		for (const [index, rtt] of [10, 20, 30, 40, 50, 60].entries()) {
			const sent = index * 1000;
			latency.trackSent(sent);
			expect(latency.trackReceived(sent + rtt)).toBe(rtt);
		}

		expect(latency.snapshot()).toEqual({
			average: 35,
			heartbeats: 6,
			recent: [60, 50, 40, 30, 20],
			sent: 5000,
			received: 5060,
		});
	});

	it("counts one round trip per heartbeat", () => {
		const latency = new Latency();
		latency.trackSent(0);
		latency.trackReceived(15);
		latency.trackReceived(30);

		const snapshot = latency.snapshot();
		snapshot.recent.push(999);

		expect(latency.snapshot()).toMatchObject({ heartbeats: 1, recent: [15], received: 30 });
	});
});
