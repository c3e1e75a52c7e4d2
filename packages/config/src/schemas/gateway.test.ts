import { describe, expect, it } from "vitest";
import { GatewayConfigSchema, LARGE_THRESHOLD_MAXIMUM, LARGE_THRESHOLD_MINIMUM } from "./gateway.js";

const base = { token: "test-token", intents: 513 };

describe("GatewayConfigSchema", () => {
	it("accepts the large threshold bounds", () => {
		expect(GatewayConfigSchema.safeParse({ ...base, large_threshold: LARGE_THRESHOLD_MINIMUM }).success).toBe(true);
		expect(GatewayConfigSchema.safeParse({ ...base, large_threshold: LARGE_THRESHOLD_MAXIMUM }).success).toBe(true);
		expect(GatewayConfigSchema.safeParse({ ...base, large_threshold: 251 }).success).toBe(false);
	});

	it("allows a zero identify limit for unqueued setups", () => {
		const result = GatewayConfigSchema.safeParse({ ...base, identify_limit: 0, identify_window_ms: 0 });
		expect(result.success).toBe(true);
	});

	it("rejects a zero identify concurrency", () => {
		expect(GatewayConfigSchema.safeParse({ ...base, identify_concurrency: 0 }).success).toBe(false);
	});

	it("rejects a malformed gateway url", () => {
		expect(GatewayConfigSchema.safeParse({ ...base, gateway_url: "not a url" }).success).toBe(false);
	});
});
