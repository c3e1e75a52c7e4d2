export function requireValue<T>(value: T | null | undefined, label = "value"): T {
	if (value == null) {
		throw new Error(`Expected ${label} to be defined`);
	}
	return value;
}

export function requireArrayItem<T>(items: readonly T[], index: number, label = "item"): T {
	const value = items[index];
	if (value === undefined) {
		throw new Error(`Expected ${label} at index ${index}`);
	}
	return value;
}

/** Runs `fn` and returns what it threw; fails if it returned normally. */
export function captureError(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error;
	}
	throw new Error("Expected function to throw");
}
