export {
	BucketedIdentifyQueue,
	type BucketedIdentifyQueueOptions,
	DEFAULT_IDENTIFY_LIMIT,
	DEFAULT_IDENTIFY_WINDOW_MS,
} from "./bucketed.js";
export { NoopIdentifyQueue } from "./noop.js";
export type { BucketSnapshot, IdentifyOutcome, IdentifyQueue, IdentifyTicket } from "./types.js";
