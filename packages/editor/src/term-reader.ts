/**
 * TermReader turns raw terminal input into TermEvents.
 *
 * stdin data events can arrive in partial chunks, so escape sequences are
 * accumulated until complete. For example, `\x1b[1;5A` might arrive as
 * `\x1b`, `[1;` and `5A`. An incomplete sequence is flushed as-is after a
 * timeout, which is how a lone ESC key press is recognized.
 *
 * Based on code from OpenTUI (https://github.com/anomalyco/opentui)
 * MIT License - Copyright (c) 2025 opentui
 */

import { EventEmitter } from "node:events";
import { debugLog } from "./debug.js";
import { charKey, decodeKey, keyEvent, pasteEvent, type TermEvent } from "./keys.js";

const ESC = "\x1b";
const BRACKETED_PASTE_START = "\x1b[200~";
const BRACKETED_PASTE_END = "\x1b[201~";

type Completeness = "complete" | "incomplete";

/**
 * Check if a string starting with ESC is a complete escape sequence
 */
function isCompleteSequence(data: string): Completeness {
	if (data.length === 1) {
		return "incomplete";
	}

	const afterEsc = data.slice(1);

	// CSI sequences: ESC [
	if (afterEsc.startsWith("[")) {
		// Old-style mouse: ESC[M + 3 bytes
		if (afterEsc.startsWith("[M")) {
			return data.length >= 6 ? "complete" : "incomplete";
		}
		return isCompleteCsiSequence(data);
	}

	// OSC, DCS and APC sequences end with ST (ESC \); OSC may also end with BEL
	if (afterEsc.startsWith("]")) {
		return data.endsWith(`${ESC}\\`) || data.endsWith("\x07") ? "complete" : "incomplete";
	}
	if (afterEsc.startsWith("P") || afterEsc.startsWith("_")) {
		return data.endsWith(`${ESC}\\`) ? "complete" : "incomplete";
	}

	// SS3 sequences: ESC O followed by a single character
	if (afterEsc.startsWith("O")) {
		return afterEsc.length >= 2 ? "complete" : "incomplete";
	}

	// Meta key sequences: ESC followed by a single character (or another ESC)
	return "complete";
}

/**
 * CSI sequences: ESC [ ... followed by a final byte (0x40-0x7E)
 */
function isCompleteCsiSequence(data: string): Completeness {
	if (data.length < 3) {
		return "incomplete";
	}

	const payload = data.slice(2);
	const lastCharCode = payload.charCodeAt(payload.length - 1);

	// "ESC [ [" starts a Linux console function key (ESC [ [ A)
	if (payload === "[") {
		return "incomplete";
	}

	if (lastCharCode >= 0x40 && lastCharCode <= 0x7e) {
		// SGR mouse: ESC[<B;X;Ym or ESC[<B;X;YM
		if (payload.startsWith("<")) {
			return /^<\d+;\d+;\d+[Mm]$/.test(payload) ? "complete" : "incomplete";
		}
		return "complete";
	}

	return "incomplete";
}

/**
 * Split accumulated input into complete sequences. Text outside escape
 * sequences is split into single codepoints.
 */
function extractCompleteSequences(buffer: string): { sequences: string[]; remainder: string } {
	const sequences: string[] = [];
	let pos = 0;

	while (pos < buffer.length) {
		if (buffer.startsWith(ESC, pos)) {
			const remaining = buffer.slice(pos);
			let seqEnd = 2;
			while (seqEnd <= remaining.length && isCompleteSequence(remaining.slice(0, seqEnd)) === "incomplete") {
				seqEnd++;
			}
			if (seqEnd > remaining.length) {
				return { sequences, remainder: remaining };
			}
			sequences.push(remaining.slice(0, seqEnd));
			pos += seqEnd;
		} else {
			const codePoint = buffer.codePointAt(pos) ?? 0;
			const length = codePoint > 0xffff ? 2 : 1;
			sequences.push(buffer.slice(pos, pos + length));
			pos += length;
		}
	}

	return { sequences, remainder: "" };
}

/** Normalize line endings of pasted text and split it into codepoints. */
function pastedCodepoints(text: string): string[] {
	return Array.from(text.replace(/\r\n/g, "\n").replace(/\r/g, "\n"));
}

export type TermReaderOptions = {
	/**
	 * Maximum time to wait for sequence completion (default: 10ms)
	 * After this time, the buffer is flushed even if incomplete
	 */
	timeout?: number;
};

export type TermReaderEventMap = {
	event: [TermEvent];
};

/**
 * Buffers terminal input and emits decoded events via the 'event' event.
 *
 * A bracketed paste is emitted as a paste-start event, one key event per
 * pasted codepoint (line endings normalized to "\n") and a paste-end event.
 */
export class TermReader extends EventEmitter<TermReaderEventMap> {
	private buffer = "";
	private timeout: ReturnType<typeof setTimeout> | null = null;
	private readonly timeoutMs: number;
	private pasteMode = false;
	private pasteBuffer = "";

	constructor(options: TermReaderOptions = {}) {
		super();
		this.timeoutMs = options.timeout ?? 10;
	}

	process(data: string | Buffer): void {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}

		// A single high byte is a meta-prefixed character: ESC + (byte - 128)
		let str: string;
		if (Buffer.isBuffer(data)) {
			const first = data[0];
			if (data.length === 1 && first !== undefined && first > 127) {
				str = `${ESC}${String.fromCharCode(first - 128)}`;
			} else {
				str = data.toString();
			}
		} else {
			str = data;
		}

		this.buffer += str;

		if (this.pasteMode) {
			this.pasteBuffer += this.buffer;
			this.buffer = "";
			this.finishPasteIfComplete();
			return;
		}

		const startIndex = this.buffer.indexOf(BRACKETED_PASTE_START);
		if (startIndex !== -1) {
			if (startIndex > 0) {
				const result = extractCompleteSequences(this.buffer.slice(0, startIndex));
				this.emitSequences(result.sequences);
				if (result.remainder.length > 0) {
					this.emitSequences([result.remainder]);
				}
			}

			this.pasteMode = true;
			this.pasteBuffer = this.buffer.slice(startIndex + BRACKETED_PASTE_START.length);
			this.buffer = "";
			this.emit("event", pasteEvent(true));
			this.finishPasteIfComplete();
			return;
		}

		const result = extractCompleteSequences(this.buffer);
		this.buffer = result.remainder;
		this.emitSequences(result.sequences);

		if (this.buffer.length > 0) {
			this.timeout = setTimeout(() => {
				this.emitSequences(this.flush());
			}, this.timeoutMs);
		}
	}

	/** Take whatever incomplete sequence is buffered. */
	flush(): string[] {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}

		if (this.buffer.length === 0) {
			return [];
		}

		const sequences = [this.buffer];
		this.buffer = "";
		return sequences;
	}

	clear(): void {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}
		this.buffer = "";
		this.pasteMode = false;
		this.pasteBuffer = "";
	}

	getBuffer(): string {
		return this.buffer;
	}

	destroy(): void {
		this.clear();
		this.removeAllListeners();
	}

	private finishPasteIfComplete(): void {
		const endIndex = this.pasteBuffer.indexOf(BRACKETED_PASTE_END);
		if (endIndex === -1) return;

		const pasted = this.pasteBuffer.slice(0, endIndex);
		const remaining = this.pasteBuffer.slice(endIndex + BRACKETED_PASTE_END.length);
		this.pasteMode = false;
		this.pasteBuffer = "";

		for (const char of pastedCodepoints(pasted)) {
			this.emit("event", keyEvent(charKey(char)));
		}
		this.emit("event", pasteEvent(false));

		if (remaining.length > 0) {
			this.process(remaining);
		}
	}

	private emitSequences(sequences: string[]): void {
		for (const sequence of sequences) {
			const key = decodeKey(sequence);
			if (key) {
				this.emit("event", keyEvent(key));
			} else {
				debugLog("term-reader", `ignored input sequence ${JSON.stringify(sequence)}`);
			}
		}
	}
}
