import { constPrompt, type Highlighter, plainHighlighter, type Prompt } from "../async-source.js";
import { CodeBuffer } from "../code-buffer.js";
import { debugLog } from "../debug.js";
import { Guarded } from "../guarded.js";
import { isFunctionKey, type Key, keyId, matchesKey, type TermEvent } from "../keys.js";
import { quoteShell } from "../quote.js";
import { BufferBuilder, RenderBuffer, truncateToHeight } from "../render-buffer.js";
import { concat, partition, type StyledText, styledWidth, transform } from "../styled.js";
import { isGraphic } from "../utils.js";
import { dummyHandler, type Handler, type Widget } from "../widget.js";

/**
 * Code shown in place of buffer.content[from, to) until it is applied, e.g. a
 * completion candidate being previewed.
 */
export interface PendingCode {
	from: number;
	to: number;
	content: string;
}

export interface CodeAreaState {
	buffer: CodeBuffer;
	pending?: PendingCode;
	/** Suppress the right prompt */
	hideRPrompt: boolean;
}

/** Calls `visit` once per (abbreviation, expansion) pair, in a stable order. */
export type Abbreviations = (visit: (abbr: string, full: string) => void) => void;

export interface CodeAreaConfig {
	/** Gets first refusal on every event */
	overlayHandler?: Handler;
	highlighter?: Highlighter;
	prompt?: Prompt;
	/** Right prompt, shown right-aligned on the first row */
	rprompt?: Prompt;
	abbreviations?: Abbreviations;
	/** Whether bracketed pastes are inserted quoted */
	quotePaste?: () => boolean;
	/** Quote function for pasted text (default: quoteShell) */
	quote?: (text: string) => string;
	/** Called with the content on Enter. Not awaited. */
	onSubmit?: (code: string) => void;
}

export type ResolvedCodeAreaConfig = Readonly<Required<CodeAreaConfig>>;

const emptyPrompt = constPrompt([]);

/** Fill every omitted callback with its default. */
export function resolveCodeAreaConfig(config: CodeAreaConfig = {}): ResolvedCodeAreaConfig {
	return {
		overlayHandler: config.overlayHandler ?? dummyHandler,
		highlighter: config.highlighter ?? plainHighlighter,
		prompt: config.prompt ?? emptyPrompt,
		rprompt: config.rprompt ?? emptyPrompt,
		abbreviations: config.abbreviations ?? (() => {}),
		quotePaste: config.quotePaste ?? (() => false),
		quote: config.quote ?? quoteShell,
		onSubmit: config.onSubmit ?? (() => {}),
	};
}

export function copyCodeAreaState(state: CodeAreaState): CodeAreaState {
	const copy: CodeAreaState = { buffer: state.buffer.clone(), hideRPrompt: state.hideRPrompt };
	if (state.pending) copy.pending = { ...state.pending };
	return copy;
}

/** Where the dot ends up once `pending` replaces its range. */
function dotAfterPending(dot: number, pending: PendingCode): number {
	if (dot < pending.from) return dot;
	if (dot <= pending.to) return pending.from + pending.content.length;
	return dot + pending.content.length - (pending.to - pending.from);
}

/** Commit the pending code into the buffer and clear it. */
export function applyPending(state: CodeAreaState): void {
	const pending = state.pending;
	if (!pending) return;
	const dot = dotAfterPending(state.buffer.dot, pending);
	state.buffer.replaceRange(pending.from, pending.to, pending.content);
	state.buffer.set(state.buffer.content, dot);
	state.pending = undefined;
}

/** What is displayed: the code with pending code applied, and where it sits. */
interface View {
	code: string;
	dot: number;
	pendingFrom: number;
	pendingTo: number;
}

function getView(state: CodeAreaState): View {
	const { buffer, pending } = state;
	if (!pending) {
		return { code: buffer.content, dot: buffer.dot, pendingFrom: 0, pendingTo: 0 };
	}
	return {
		code: buffer.content.slice(0, pending.from) + pending.content + buffer.content.slice(pending.to),
		dot: dotAfterPending(buffer.dot, pending),
		pendingFrom: pending.from,
		pendingTo: pending.from + pending.content.length,
	};
}

/** Put `rprompt` at the right end of the first row if at least one column of gap remains. */
function withRPrompt(buffer: RenderBuffer, rprompt: StyledText): RenderBuffer {
	const rpromptWidth = styledWidth(rprompt);
	const first = buffer.lines[0];
	if (rpromptWidth === 0 || first === undefined) return buffer;

	const used = first.reduce((sum, cell) => sum + cell.width, 0);
	const padding = buffer.width - used - rpromptWidth;
	if (padding < 1) return buffer;

	const tail = new BufferBuilder(padding + rpromptWidth).writeSpaces(padding).writeStyled(rprompt).buffer();
	const [cells] = tail.lines;
	if (tail.lines.length !== 1 || cells === undefined) return buffer;
	return new RenderBuffer(buffer.width, [[...first, ...cells], ...buffer.lines.slice(1)], buffer.dot);
}

/**
 * A widget for showing and editing code, with a prompt, a right prompt,
 * highlighting, abbreviation expansion and bracketed paste.
 *
 * State is only reachable through copyState() and mutateState(). Insertion
 * tracking is private to handle() and must only be driven from one caller.
 */
export class CodeArea implements Widget {
	readonly config: ResolvedCodeAreaConfig;
	private readonly state: Guarded<CodeAreaState>;

	// Text typed consecutively; abbreviations are matched against its end
	private inserts = "";
	// Buffer right after the last tracked insert
	private lastBuffer: CodeBuffer | null = null;
	private pasting = false;
	private pasteBuffer = "";

	constructor(config: CodeAreaConfig = {}, initialState: Partial<CodeAreaState> = {}) {
		this.config = resolveCodeAreaConfig(config);
		const state: CodeAreaState = {
			buffer: initialState.buffer ?? new CodeBuffer(),
			hideRPrompt: initialState.hideRPrompt ?? false,
		};
		if (initialState.pending) state.pending = initialState.pending;
		this.state = new Guarded(state, copyCodeAreaState);
	}

	/** A deep copy of the current state. */
	copyState(): CodeAreaState {
		return this.state.snapshot();
	}

	/**
	 * Change the state. `f` receives a copy that replaces the state when `f`
	 * returns; a concurrent copyState() sees the old or the new state.
	 *
	 * @throws Error when called from within another mutateState callback
	 */
	mutateState<R>(f: (state: CodeAreaState) => R): R {
		return this.state.mutate(f);
	}

	/** Call onSubmit with the current content. */
	submit(): void {
		const code = this.state.snapshot().buffer.content;
		this.config.onSubmit(code);
	}

	render(width: number, height: number): RenderBuffer {
		const state = this.copyState();
		const view = getView(state);
		const { text, errors } = this.config.highlighter.get(view.code);
		const prompt = this.config.prompt.get();
		const rprompt = state.hideRPrompt ? [] : this.config.rprompt.get();

		const builder = new BufferBuilder(width);
		builder.eagerWrap = true;
		builder.writeStyled(prompt);
		if (builder.lineCount === 1 && builder.column * 2 < width) {
			builder.indent = builder.column;
		}

		let code = text;
		if (view.pendingTo > view.pendingFrom) {
			const [before = [], pending = [], after = []] = partition(text, view.pendingFrom, view.pendingTo);
			code = concat(before, transform(pending, "underline"), after);
		}
		const [beforeDot = [], afterDot = []] = partition(code, view.dot);
		builder.writeStyled(beforeDot).setDotHere().writeStyled(afterDot);

		builder.eagerWrap = false;
		builder.indent = 0;
		for (const error of errors) {
			builder.newline();
			builder.write(error.message);
		}

		return truncateToHeight(withRPrompt(builder.buffer(), rprompt), height);
	}

	handle(event: TermEvent): boolean {
		if (this.config.overlayHandler.handle(event)) {
			return true;
		}
		if (event.type === "paste") {
			return this.handlePaste(event.start);
		}
		return this.handleKey(event.key);
	}

	private resetInserts(): void {
		this.inserts = "";
		this.lastBuffer = null;
	}

	private handlePaste(start: boolean): boolean {
		this.resetInserts();
		if (start) {
			this.pasting = true;
			this.pasteBuffer = "";
			return true;
		}

		let text = this.pasteBuffer;
		if (this.config.quotePaste()) {
			text = this.config.quote(text);
		}
		this.mutateState((state) => state.buffer.insertAtDot(text));
		this.pasting = false;
		this.pasteBuffer = "";
		return true;
	}

	private handleKey(key: Key): boolean {
		if (this.pasting) {
			if (key.kind === "char" && key.mods === 0) {
				this.pasteBuffer += key.char;
			} else {
				debugLog("code-area", `dropped ${keyId(key)} during paste`);
			}
			return true;
		}

		if (matchesKey(key, "enter")) {
			this.resetInserts();
			this.submit();
			return true;
		}
		if (matchesKey(key, "backspace")) {
			this.resetInserts();
			this.mutateState((state) => state.buffer.deleteBeforeDot());
			return true;
		}
		if (isFunctionKey(key) || key.kind !== "char" || !isGraphic(key.char)) {
			this.resetInserts();
			return false;
		}

		this.insertChar(key.char);
		return true;
	}

	private insertChar(char: string): void {
		this.mutateState((state) => {
			const buffer = state.buffer;
			if (this.lastBuffer === null || !this.lastBuffer.equals(buffer)) {
				// The buffer changed since the last insert
				this.resetInserts();
			}
			buffer.insertAtDot(char);
			this.inserts += char;
			this.lastBuffer = buffer.clone();

			let abbr = "";
			let full = "";
			this.config.abbreviations((a, f) => {
				if (this.inserts.endsWith(a) && a.length > abbr.length) {
					abbr = a;
					full = f;
				}
			});
			if (abbr.length > 0) {
				buffer.replaceRange(buffer.dot - abbr.length, buffer.dot, full);
				this.resetInserts();
			}
		});
	}
}
