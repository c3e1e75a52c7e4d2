import { afterEach, describe, expect, it, vi } from "vitest";
import { Heartbeater } from "./heartbeat.js";

describe("Heartbeater", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("jitters the first tick within the interval", () => {
		vi.useFakeTimers();
		vi.setSystemTime(10_000);

		const heartbeater = new Heartbeater(41_250, () => 0.25);

		expect(heartbeater.throttle.nextDeadline).toBe(10_000 + 10_312);
		heartbeater.stop();
	});

	it("reports a zombied connection when the last heartbeat was not acknowledged", () => {
		const heartbeater = new Heartbeater(1000, () => 0);
		expect(heartbeater.tick()).toBe("send");

		heartbeater.markSent(500);
		expect(heartbeater.lastSent).toBe(500);
		expect(heartbeater.lastAcked).toBe(false);
		expect(heartbeater.tick()).toBe("zombied");

		heartbeater.acknowledge();
		expect(heartbeater.tick()).toBe("send");
		heartbeater.stop();
	});
});
