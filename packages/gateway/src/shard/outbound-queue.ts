/**
 * Commands accepted while the shard cannot send them yet, sent in order
 * once it can.
 */
export class OutboundQueue<T> {
	private readonly maxSize: number;
	private items: T[] = [];

	constructor(maxSize = 200) {
		this.maxSize = maxSize;
	}

	enqueue(item: T): boolean {
		if (this.items.length >= this.maxSize) {
			return false;
		}
		this.items.push(item);
		return true;
	}

	/** Puts an item taken with `shift` back at the front, even when the queue is full. */
	requeue(item: T): void {
		this.items.unshift(item);
	}

	shift(): T | undefined {
		return this.items.shift();
	}

	clear(): void {
		this.items = [];
	}

	size(): number {
		return this.items.length;
	}
}
