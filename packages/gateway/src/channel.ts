interface Waiter<T> {
	resolve: (result: IteratorResult<T, undefined>) => void;
	reject: (error: Error) => void;
}

/**
 * Unbounded single-consumer async queue. Closing it lets the consumer drain
 * what is buffered; closing with an error rejects once the buffer is empty.
 */
export class EventChannel<T> implements AsyncIterable<T> {
	private readonly buffer: T[] = [];
	private readonly waiters: Waiter<T>[] = [];
	private isClosed = false;
	private failure: Error | null = null;

	get closed(): boolean {
		return this.isClosed;
	}

	get size(): number {
		return this.buffer.length;
	}

	/** Returns false when the channel is closed and the item was dropped. */
	push(item: T): boolean {
		if (this.isClosed) {
			return false;
		}
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter.resolve({ done: false, value: item });
		} else {
			this.buffer.push(item);
		}
		return true;
	}

	close(error?: Error): void {
		if (this.isClosed) {
			return;
		}
		this.isClosed = true;
		this.failure = error ?? null;
		for (const waiter of this.waiters.splice(0)) {
			if (this.failure) {
				waiter.reject(this.failure);
			} else {
				waiter.resolve({ done: true, value: undefined });
			}
		}
	}

	next(): Promise<IteratorResult<T, undefined>> {
		if (this.buffer.length > 0) {
			const value = this.buffer.shift();
			if (value !== undefined) {
				return Promise.resolve<IteratorResult<T, undefined>>({ done: false, value });
			}
		}
		if (this.isClosed) {
			if (this.failure) {
				return Promise.reject(this.failure);
			}
			return Promise.resolve<IteratorResult<T, undefined>>({ done: true, value: undefined });
		}
		return new Promise<IteratorResult<T, undefined>>((resolve, reject) => {
			this.waiters.push({ resolve, reject });
		});
	}

	[Symbol.asyncIterator](): AsyncIterator<T, undefined> {
		return {
			next: () => this.next(),
			return: async () => {
				this.buffer.length = 0;
				this.close();
				return { done: true, value: undefined };
			},
		};
	}
}
