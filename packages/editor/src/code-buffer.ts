import { isWhitespaceChar } from "./utils.js";

function isHighSurrogate(code: number): boolean {
	return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
	return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Whether `offset` lies within `str` and does not split a surrogate pair.
 */
export function isCodepointBoundary(str: string, offset: number): boolean {
	if (!Number.isInteger(offset) || offset < 0 || offset > str.length) return false;
	if (offset === 0 || offset === str.length) return true;
	return !(isLowSurrogate(str.charCodeAt(offset)) && isHighSurrogate(str.charCodeAt(offset - 1)));
}

/**
 * Offset of the codepoint boundary before `offset` (0 stays 0).
 */
export function previousBoundary(str: string, offset: number): number {
	if (offset <= 0) return 0;
	if (offset >= 2 && isLowSurrogate(str.charCodeAt(offset - 1)) && isHighSurrogate(str.charCodeAt(offset - 2))) {
		return offset - 2;
	}
	return offset - 1;
}

/**
 * Offset of the codepoint boundary after `offset` (the end stays the end).
 */
export function nextBoundary(str: string, offset: number): number {
	if (offset >= str.length) return str.length;
	const codePoint = str.codePointAt(offset);
	return codePoint !== undefined && codePoint > 0xffff ? offset + 2 : offset + 1;
}

function assertBoundary(str: string, offset: number, what: string): void {
	if (!isCodepointBoundary(str, offset)) {
		throw new RangeError(`${what} ${offset} is not a codepoint boundary of a ${str.length}-unit string`);
	}
}

/**
 * Editable text with a cursor ("dot").
 *
 * The dot is an offset in UTF-16 code units. It always lies in
 * [0, content.length] and never between the halves of a surrogate pair.
 * Every method keeps that invariant; `set` and `replaceRange` throw a
 * RangeError when asked to break it.
 */
export class CodeBuffer {
	private _content: string;
	private _dot: number;

	constructor(content = "", dot: number = content.length) {
		assertBoundary(content, dot, "dot");
		this._content = content;
		this._dot = dot;
	}

	get content(): string {
		return this._content;
	}

	get dot(): number {
		return this._dot;
	}

	/** Replace content and dot at once. */
	set(content: string, dot: number = content.length): void {
		assertBoundary(content, dot, "dot");
		this._content = content;
		this._dot = dot;
	}

	insertAtDot(text: string): void {
		const content = this._content.slice(0, this._dot) + text + this._content.slice(this._dot);
		const dot = this._dot + text.length;
		assertBoundary(content, dot, "dot");
		this._content = content;
		this._dot = dot;
	}

	/**
	 * Delete the codepoint ending at the dot.
	 * @returns false when the dot is at the start
	 */
	deleteBeforeDot(): boolean {
		if (this._dot === 0) return false;
		const start = previousBoundary(this._content, this._dot);
		this._content = this._content.slice(0, start) + this._content.slice(this._dot);
		this._dot = start;
		return true;
	}

	/**
	 * Delete the codepoint starting at the dot.
	 * @returns false when the dot is at the end
	 */
	deleteAfterDot(): boolean {
		if (this._dot === this._content.length) return false;
		const end = nextBoundary(this._content, this._dot);
		this._content = this._content.slice(0, this._dot) + this._content.slice(end);
		return true;
	}

	moveDotLeft(): boolean {
		if (this._dot === 0) return false;
		this._dot = previousBoundary(this._content, this._dot);
		return true;
	}

	moveDotRight(): boolean {
		if (this._dot === this._content.length) return false;
		this._dot = nextBoundary(this._content, this._dot);
		return true;
	}

	moveDotToStart(): void {
		this._dot = 0;
	}

	moveDotToEnd(): void {
		this._dot = this._content.length;
	}

	/** Delete everything before the dot and return it. */
	deleteToStart(): string {
		const removed = this._content.slice(0, this._dot);
		this._content = this._content.slice(this._dot);
		this._dot = 0;
		return removed;
	}

	/** Delete everything after the dot and return it. */
	deleteToEnd(): string {
		const removed = this._content.slice(this._dot);
		this._content = this._content.slice(0, this._dot);
		return removed;
	}

	/**
	 * Delete the whitespace-delimited word before the dot, along with any
	 * whitespace between it and the dot.
	 */
	deleteWordBeforeDot(): string {
		let start = this._dot;
		while (start > 0 && isWhitespaceChar(this._content[start - 1] ?? "")) {
			start = previousBoundary(this._content, start);
		}
		while (start > 0 && !isWhitespaceChar(this._content[start - 1] ?? "")) {
			start = previousBoundary(this._content, start);
		}
		const removed = this._content.slice(start, this._dot);
		this._content = this._content.slice(0, start) + this._content.slice(this._dot);
		this._dot = start;
		return removed;
	}

	/**
	 * Replace content[from, to) with `text`. A dot after the range shifts with
	 * it; a dot inside the range moves to the end of the new text.
	 */
	replaceRange(from: number, to: number, text: string): void {
		assertBoundary(this._content, from, "range start");
		assertBoundary(this._content, to, "range end");
		if (from > to) {
			throw new RangeError(`range start ${from} is after range end ${to}`);
		}
		const content = this._content.slice(0, from) + text + this._content.slice(to);
		let dot = this._dot;
		if (dot >= to) {
			dot += text.length - (to - from);
		} else if (dot > from) {
			dot = from + text.length;
		}
		assertBoundary(content, dot, "dot");
		this._content = content;
		this._dot = dot;
	}

	equals(other: CodeBuffer): boolean {
		return this._content === other._content && this._dot === other._dot;
	}

	clone(): CodeBuffer {
		return new CodeBuffer(this._content, this._dot);
	}
}
