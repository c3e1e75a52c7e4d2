import { captureError } from "@shardline/test-utils";
import { describe, expect, it } from "vitest";
import { ShardIdError } from "./errors.js";
import { ShardId } from "./shard-id.js";

describe("ShardId", () => {
	it("renders as index/total", () => {
		const id = new ShardId(3, 8);

		expect(id.toString()).toBe("3/8");
		expect(id.toArray()).toEqual([3, 8]);
		expect(id.equals(new ShardId(3, 8))).toBe(true);
		expect(id.equals(new ShardId(3, 9))).toBe(false);
		expect(ShardId.ONE.toString()).toBe("0/1");
	});

	it.each([
		[1, 1, "INDEX_OUT_OF_RANGE"],
		[-1, 4, "INDEX_OUT_OF_RANGE"],
		[0, 0, "TOTAL_NOT_POSITIVE"],
		[0.5, 2, "NOT_AN_INTEGER"],
	])("rejects %i/%i", (index, total, code) => {
		const error = captureError(() => new ShardId(index, total));

		expect(error).toBeInstanceOf(ShardIdError);
		expect(error).toMatchObject({ code });
	});
});
