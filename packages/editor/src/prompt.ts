import { type Prompt, LateUpdates } from "./async-source.js";
import { debugLog } from "./debug.js";
import { type StyledText, transform } from "./styled.js";

export interface AsyncPromptOptions {
	/** Computes the prompt. May return synchronously or a promise. */
	compute: () => StyledText | Promise<StyledText>;
	/**
	 * How readily a non-forced trigger recomputes:
	 * below 5 never, 5-9 when the working directory changed, 10 and above always.
	 * Default 5.
	 */
	eagerness?: number;
	/** Milliseconds before a running computation marks the current prompt stale (default: 200) */
	staleThreshold?: number;
	/** Applied to the last prompt while it is stale (default: dim) */
	staleTransform?: (text: StyledText) => StyledText;
	/** Prompt shown before the first computation finishes */
	initial?: StyledText;
	/** Source of the working directory (default: process.cwd) */
	cwd?: () => string;
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * A prompt computed by a user function off the render path.
 *
 * At most one computation runs at a time; triggers arriving meanwhile are
 * folded into a single follow-up computation. A computation that settles
 * synchronously is delivered immediately.
 */
export class AsyncPrompt implements Prompt {
	private readonly compute: () => StyledText | Promise<StyledText>;
	private readonly eagerness: number;
	private readonly staleThreshold: number;
	private readonly staleTransform: (text: StyledText) => StyledText;
	private readonly cwd: () => string;
	private readonly updates = new LateUpdates<StyledText>();

	private current: StyledText;
	private fresh: StyledText;
	private lastCwd: string | undefined;
	private running = false;
	private queued = false;
	private requested = 0;
	private delivered = 0;
	private staleTimer: ReturnType<typeof setTimeout> | null = null;

	constructor(options: AsyncPromptOptions) {
		this.compute = options.compute;
		this.eagerness = options.eagerness ?? 5;
		this.staleThreshold = options.staleThreshold ?? 200;
		this.staleTransform = options.staleTransform ?? ((text) => transform(text, "dim"));
		this.cwd = options.cwd ?? (() => process.cwd());
		this.current = options.initial ?? [];
		this.fresh = this.current;
	}

	get(): StyledText {
		return this.current;
	}

	trigger(force: boolean): void {
		if (!force && !this.shouldRecompute()) return;
		this.lastCwd = this.cwd();

		if (this.running) {
			this.queued = true;
			return;
		}
		this.start();
	}

	lateUpdates(): LateUpdates<StyledText> {
		return this.updates;
	}

	/** Stop delivering updates. Results of computations still running are dropped. */
	close(): void {
		this.clearStaleTimer();
		this.queued = false;
		this.updates.close();
	}

	private shouldRecompute(): boolean {
		if (this.eagerness >= 10) return true;
		if (this.eagerness >= 5) return this.cwd() !== this.lastCwd;
		return false;
	}

	private start(): void {
		const seq = ++this.requested;

		let result: StyledText | Promise<StyledText>;
		try {
			result = this.compute();
		} catch (error) {
			debugLog("prompt", `computation failed: ${errorMessage(error)}`);
			this.finish();
			return;
		}

		if (!(result instanceof Promise)) {
			this.deliver(seq, result);
			this.finish();
			return;
		}

		this.running = true;
		this.staleTimer = setTimeout(() => {
			this.staleTimer = null;
			if (this.delivered >= seq || this.updates.isClosed) return;
			this.current = this.staleTransform(this.fresh);
			this.updates.push(this.current);
		}, this.staleThreshold);

		result.then(
			(text) => {
				this.deliver(seq, text);
				this.finish();
			},
			(error: unknown) => {
				debugLog("prompt", `computation failed: ${errorMessage(error)}`);
				if (this.current !== this.fresh && !this.updates.isClosed) {
					this.current = this.fresh;
					this.updates.push(this.current);
				}
				this.finish();
			},
		);
	}

	private deliver(seq: number, text: StyledText): void {
		if (seq <= this.delivered || this.updates.isClosed) return;
		this.delivered = seq;
		this.fresh = text;
		this.current = text;
		this.updates.push(text);
	}

	private finish(): void {
		this.clearStaleTimer();
		this.running = false;
		if (this.queued) {
			this.queued = false;
			this.start();
		}
	}

	private clearStaleTimer(): void {
		if (this.staleTimer) {
			clearTimeout(this.staleTimer);
			this.staleTimer = null;
		}
	}
}
