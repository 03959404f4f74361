/**
 * A promise that is settled from the outside.
 */
export class Deferred<T> {
	resolve: (value: T) => void = () => {};
	reject: (reason: unknown) => void = () => {};
	readonly promise: Promise<T>;

	constructor() {
		this.promise = new Promise<T>((resolve, reject) => {
			this.resolve = resolve;
			this.reject = reject;
		});
	}
}

/** Let pending promise callbacks run. */
export function tick(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
