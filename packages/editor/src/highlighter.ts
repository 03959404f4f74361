import { type Highlighted, type Highlighter, LateUpdates } from "./async-source.js";
import { debugLog } from "./debug.js";
import { plain } from "./styled.js";

export type HighlightFunction = (code: string) => Highlighted | Promise<Highlighted>;

export interface AsyncHighlighterOptions {
	/** Maximum number of cached results (default: 32) */
	cacheSize?: number;
}

function unhighlighted(code: string): Highlighted {
	return { text: plain(code), errors: [] };
}

/**
 * Wraps a highlight function that may be slow.
 *
 * get(code) never waits: it returns a cached result, a synchronous result, or
 * the plain code while an asynchronous highlight is running. When that
 * highlight settles and its code is still the latest requested, the result is
 * pushed to lateUpdates().
 */
export class AsyncHighlighter implements Highlighter {
	private readonly cache = new Map<string, Highlighted>();
	private readonly running = new Map<string, number>();
	private readonly updates = new LateUpdates<Highlighted>();
	private readonly cacheSize: number;
	private latest: string | undefined;
	private generation = 0;

	constructor(
		private readonly highlight: HighlightFunction,
		options: AsyncHighlighterOptions = {},
	) {
		this.cacheSize = Math.max(1, options.cacheSize ?? 32);
	}

	get(code: string): Highlighted {
		this.latest = code;
		const cached = this.cache.get(code);
		if (cached) return cached;
		if (this.running.has(code)) return unhighlighted(code);
		return this.start(code) ?? unhighlighted(code);
	}

	/**
	 * Recompute for the latest code. Without force a cached or running result
	 * is kept; force discards the whole cache first.
	 */
	trigger(force: boolean): void {
		if (force) this.cache.clear();
		const code = this.latest;
		if (code === undefined || this.cache.has(code)) return;
		if (!force && this.running.has(code)) return;

		const result = this.start(code);
		if (result) this.updates.push(result);
	}

	lateUpdates(): LateUpdates<Highlighted> {
		return this.updates;
	}

	close(): void {
		this.running.clear();
		this.updates.close();
	}

	/** Start highlighting; returns the result when it is available synchronously. */
	private start(code: string): Highlighted | undefined {
		let result: Highlighted | Promise<Highlighted>;
		try {
			result = this.highlight(code);
		} catch (error) {
			this.logFailure(error);
			result = unhighlighted(code);
		}

		if (!(result instanceof Promise)) {
			this.store(code, result);
			return result;
		}

		const generation = ++this.generation;
		this.running.set(code, generation);
		result.then(
			(highlighted) => this.settle(code, generation, highlighted),
			(error: unknown) => {
				this.logFailure(error);
				this.settle(code, generation, unhighlighted(code));
			},
		);
		return undefined;
	}

	private settle(code: string, generation: number, highlighted: Highlighted): void {
		// Superseded by a forced recomputation, or closed
		if (this.running.get(code) !== generation) return;
		this.running.delete(code);
		this.store(code, highlighted);
		if (code === this.latest) this.updates.push(highlighted);
	}

	private store(code: string, highlighted: Highlighted): void {
		this.cache.delete(code);
		this.cache.set(code, highlighted);
		while (this.cache.size > this.cacheSize) {
			const oldest = this.cache.keys().next();
			if (oldest.done) break;
			this.cache.delete(oldest.value);
		}
	}

	private logFailure(error: unknown): void {
		const message = error instanceof Error ? error.message : String(error);
		debugLog("highlighter", `highlight failed: ${message}`);
	}
}
