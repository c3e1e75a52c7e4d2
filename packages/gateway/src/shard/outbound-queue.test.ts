import { describe, expect, it } from "vitest";
import { OutboundQueue } from "./outbound-queue.js";

describe("OutboundQueue", () => {
	it("refuses items past its capacity", () => {
		const queue = new OutboundQueue<string>(2);

		expect(queue.enqueue("a")).toBe(true);
		expect(queue.enqueue("b")).toBe(true);
		expect(queue.enqueue("c")).toBe(false);
		expect(queue.size()).toBe(2);
	});

	it("hands items out in order", () => {
		const queue = new OutboundQueue<string>();
		queue.enqueue("a");
		queue.enqueue("b");

		expect(queue.shift()).toBe("a");
		expect(queue.shift()).toBe("b");
		expect(queue.shift()).toBeUndefined();
	});

	it("puts a requeued item back in front, past its capacity", () => {
		const queue = new OutboundQueue<string>(2);
		queue.enqueue("a");
		queue.enqueue("b");
		const first = queue.shift();
		queue.enqueue("c");

		queue.requeue(first ?? "");

		expect(queue.size()).toBe(3);
		expect([queue.shift(), queue.shift(), queue.shift()]).toEqual(["a", "b", "c"]);
	});
});
