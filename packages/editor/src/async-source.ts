import { plain, type StyledText } from "./styled.js";

/**
 * Channel of late updates.
 *
 * Each delivered value means "a newer result is available from get()".
 * Values pushed while nobody is waiting are coalesced: a consumer that falls
 * behind receives only the latest one. Iterate with `for await`; iteration
 * ends when the channel is closed.
 */
export class LateUpdates<T> implements AsyncIterable<T> {
	private pending: { value: T } | null = null;
	private waiting: ((result: IteratorResult<T>) => void)[] = [];
	private closed = false;

	/** A channel that never delivers anything. */
	static closed<T>(): LateUpdates<T> {
		const channel = new LateUpdates<T>();
		channel.close();
		return channel;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	push(value: T): void {
		if (this.closed) return;

		const waiter = this.waiting.shift();
		if (waiter) {
			waiter({ value, done: false });
		} else {
			this.pending = { value };
		}
	}

	close(): void {
		this.closed = true;
		for (const waiter of this.waiting.splice(0)) {
			waiter({ value: undefined, done: true });
		}
	}

	/** Wait for the next value; resolves to done once the channel is closed. */
	next(): Promise<IteratorResult<T>> {
		if (this.pending) {
			const result: IteratorResult<T> = { value: this.pending.value, done: false };
			this.pending = null;
			return Promise.resolve(result);
		}
		if (this.closed) {
			const result: IteratorResult<T> = { value: undefined, done: true };
			return Promise.resolve(result);
		}
		return new Promise((resolve) => this.waiting.push(resolve));
	}

	async *[Symbol.asyncIterator](): AsyncIterator<T> {
		while (true) {
			const result = await this.next();
			if (result.done) return;
			yield result.value;
		}
	}
}

/**
 * A value computed off the interaction path.
 *
 * - get() returns the latest available result without waiting
 * - trigger(force) requests recomputation and returns immediately; force is set
 *   at the start of a session and after an interrupt that resets the editor
 * - lateUpdates() is the channel a driver listens on to know when to re-render
 */
export interface AsyncSource<T, I extends unknown[] = []> {
	get(...input: I): T;
	trigger(force: boolean): void;
	lateUpdates(): LateUpdates<T>;
}

/** Highlighted code plus static problems found in it. */
export interface Highlighted {
	text: StyledText;
	errors: readonly Error[];
}

export type Highlighter = AsyncSource<Highlighted, [code: string]>;

export type Prompt = AsyncSource<StyledText>;

/** A prompt that is always the same text. */
export function constPrompt(text: StyledText): Prompt {
	const updates = LateUpdates.closed<StyledText>();
	return {
		get: () => text,
		trigger: () => {},
		lateUpdates: () => updates,
	};
}

/** A highlighter that leaves code unstyled and reports no errors. */
export const plainHighlighter: Highlighter = {
	get: (code) => ({ text: plain(code), errors: [] }),
	trigger: () => {},
	lateUpdates: () => LateUpdates.closed<Highlighted>(),
};
