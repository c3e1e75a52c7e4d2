import type { IdentifyQueue, IdentifyTicket } from "./types.js";

/**
 * Grants every request immediately. For single-shard bots and tests.
 */
export class NoopIdentifyQueue implements IdentifyQueue {
	enqueue(): IdentifyTicket {
		return { granted: Promise.resolve("granted"), cancel: () => {} };
	}
}
