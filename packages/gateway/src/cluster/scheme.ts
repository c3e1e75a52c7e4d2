import { ShardSchemeError } from "../errors.js";

/**
 * Which shards a cluster runs.
 *
 * - auto: every shard, with the total recommended by the gateway info provider
 * - range: shards `from..=to` out of `total`
 * - bucket: every shard of one identify bucket, for running one bucket per process
 */
export type ShardScheme =
	| { type: "auto" }
	| { type: "range"; from: number; to: number; total: number }
	| { type: "bucket"; bucketId: number; concurrency: number; total: number };

export type ResolvedShardScheme = Exclude<ShardScheme, { type: "auto" }>;

function assertTotal(total: number): void {
	if (!Number.isInteger(total) || total < 1) {
		throw new ShardSchemeError(`shard total must be a positive integer, got ${total}`, "INVALID_TOTAL");
	}
}

/** Validates the scheme and lists the shard indices it covers, ascending. */
export function shardIndices(scheme: ResolvedShardScheme): number[] {
	assertTotal(scheme.total);

	if (scheme.type === "range") {
		if (scheme.from > scheme.to) {
			throw new ShardSchemeError(`shard range ${scheme.from}..=${scheme.to} is empty`, "EMPTY_RANGE");
		}
		if (scheme.to >= scheme.total) {
			throw new ShardSchemeError(
				`shard ${scheme.to} is out of range for a total of ${scheme.total}`,
				"ID_TOO_LARGE"
			);
		}
		const indices: number[] = [];
		for (let index = scheme.from; index <= scheme.to; index += 1) {
			indices.push(index);
		}
		return indices;
	}

	if (scheme.bucketId >= scheme.concurrency) {
		throw new ShardSchemeError(
			`bucket ${scheme.bucketId} is out of range for a concurrency of ${scheme.concurrency}`,
			"BUCKET_TOO_LARGE"
		);
	}
	const indices: number[] = [];
	for (let index = scheme.bucketId; index < scheme.total; index += scheme.concurrency) {
		indices.push(index);
	}
	return indices;
}
