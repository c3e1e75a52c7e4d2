import { ShardIdError } from "./errors.js";

/**
 * Position of a shard within the total number of shards, as sent in
 * Identify. Immutable once constructed.
 */
export class ShardId {
	static readonly ONE = new ShardId(0, 1);

	constructor(
		readonly index: number,
		readonly total: number
	) {
		if (!Number.isInteger(index) || !Number.isInteger(total)) {
			throw new ShardIdError(`shard id ${index}/${total} must be made of integers`, "NOT_AN_INTEGER");
		}
		if (total < 1) {
			throw new ShardIdError(`shard total must be at least 1, got ${total}`, "TOTAL_NOT_POSITIVE");
		}
		if (index < 0 || index >= total) {
			throw new ShardIdError(`shard index ${index} is not within [0, ${total})`, "INDEX_OUT_OF_RANGE");
		}
	}

	toArray(): [number, number] {
		return [this.index, this.total];
	}

	equals(other: ShardId): boolean {
		return this.index === other.index && this.total === other.total;
	}

	toString(): string {
		return `${this.index}/${this.total}`;
	}
}
