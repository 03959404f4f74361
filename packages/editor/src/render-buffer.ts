import defaultChalk, { type ChalkInstance } from "chalk";
import { applyStyle, mergeStyle, type Style, type StyledText, styleEquals } from "./styled.js";
import { getSegmenter, graphemeWidth } from "./utils.js";

/**
 * Cursor position marker - APC (Application Program Command) sequence.
 * Zero-width; terminals ignore it. `RenderBuffer.toLines` emits it at the dot
 * so a driver can find the cursor and position the hardware cursor there.
 */
export const CURSOR_MARKER = "\x1b_lw:c\x07";

/** One grapheme on the grid. A wide grapheme has width 2. */
export interface Cell {
	readonly text: string;
	readonly width: number;
	readonly style: Style;
}

/** A position on the grid: line index and column. */
export interface Pos {
	readonly line: number;
	readonly col: number;
}

export interface ToLinesOptions {
	/** Chalk instance used for ANSI styling (default: chalk's auto-detected instance) */
	chalk?: ChalkInstance;
	/** Emit CURSOR_MARKER at the dot (default: true) */
	cursorMarker?: boolean;
}

/**
 * The result of one render: lines of cells no wider than `width`, plus the
 * position of the cursor. Methods return new buffers.
 */
export class RenderBuffer {
	constructor(
		readonly width: number,
		readonly lines: readonly (readonly Cell[])[],
		readonly dot: Pos,
	) {}

	/** Keep lines [low, high); the dot line is shifted accordingly. */
	trimToLines(low: number, high: number): RenderBuffer {
		return new RenderBuffer(this.width, this.lines.slice(low, high), {
			line: this.dot.line - low,
			col: this.dot.col,
		});
	}

	/** Append the lines of `other`; with `moveDot` the dot becomes other's dot. */
	extend(other: RenderBuffer, moveDot: boolean): RenderBuffer {
		const dot = moveDot ? { line: other.dot.line + this.lines.length, col: other.dot.col } : this.dot;
		return new RenderBuffer(this.width, [...this.lines, ...other.lines], dot);
	}

	/** Unstyled text of every line. */
	toPlainLines(): string[] {
		return this.lines.map((line) => line.map((cell) => cell.text).join(""));
	}

	/** Lines as ANSI-styled strings, optionally carrying CURSOR_MARKER at the dot. */
	toLines(options: ToLinesOptions = {}): string[] {
		const chalk = options.chalk ?? defaultChalk;
		const withMarker = options.cursorMarker ?? true;

		return this.lines.map((line, lineIndex) => {
			const markerCol = withMarker && lineIndex === this.dot.line ? this.dot.col : -1;
			let out = "";
			let run = "";
			let runStyle: Style = {};
			let col = 0;
			let markerWritten = false;

			const flush = (): void => {
				if (run.length > 0) out += applyStyle(chalk, runStyle, run);
				run = "";
			};

			for (const cell of line) {
				if (col === markerCol && !markerWritten) {
					flush();
					out += CURSOR_MARKER;
					markerWritten = true;
				}
				if (!styleEquals(cell.style, runStyle)) {
					flush();
					runStyle = cell.style;
				}
				run += cell.text;
				col += cell.width;
			}
			flush();
			if (markerCol >= 0 && !markerWritten) out += CURSOR_MARKER;
			return out;
		});
	}
}

/**
 * Keep at most `maxHeight` rows (at least one) with the dot row among them:
 * rows go from the bottom while the dot row is within the first `maxHeight`,
 * otherwise from the top so that the dot row is last.
 */
export function truncateToHeight(buffer: RenderBuffer, maxHeight: number): RenderBuffer {
	const height = Math.max(1, maxHeight);
	if (buffer.lines.length <= height) return buffer;
	if (buffer.dot.line < height) return buffer.trimToLines(0, height);
	return buffer.trimToLines(buffer.dot.line - height + 1, buffer.dot.line + 1);
}

const controlRegex = /\p{Cc}/u;

/**
 * Composes a RenderBuffer by writing text that wraps at `width`.
 *
 * - `indent`: columns of spaces written at the start of every line begun by
 *   wrapping or `newline()`.
 * - `eagerWrap`: start a new line as soon as a line is full, so that a dot
 *   set afterwards lands at the start of the next line.
 */
export class BufferBuilder {
	indent = 0;
	eagerWrap = false;

	private lines: Cell[][] = [[]];
	private col = 0;
	private dot: Pos = { line: 0, col: 0 };

	constructor(readonly width: number) {}

	/** Current column on the last line. */
	get column(): number {
		return this.col;
	}

	get lineCount(): number {
		return this.lines.length;
	}

	/**
	 * Write plain text with a style. "\n" starts a new line; other control
	 * characters are shown in caret notation ("^I"), inverted.
	 */
	write(text: string, style: Style = {}): this {
		for (const { segment } of getSegmenter().segment(text)) {
			if (controlRegex.test(segment)) {
				for (const char of segment) {
					this.writeControl(char, style);
				}
			} else {
				this.writeCell(segment, graphemeWidth(segment), style);
			}
		}
		return this;
	}

	writeStyled(text: StyledText): this {
		for (const segment of text) {
			this.write(segment.text, segment.style);
		}
		return this;
	}

	writeSpaces(count: number, style: Style = {}): this {
		return this.write(" ".repeat(Math.max(0, count)), style);
	}

	newline(): this {
		this.lines.push([]);
		this.col = 0;
		const indent = Math.min(this.indent, this.width);
		for (let i = 0; i < indent; i++) {
			this.currentLine().push({ text: " ", width: 1, style: {} });
		}
		this.col = indent;
		return this;
	}

	setDotHere(): this {
		this.dot = { line: this.lines.length - 1, col: this.col };
		return this;
	}

	buffer(): RenderBuffer {
		return new RenderBuffer(
			this.width,
			this.lines.map((line) => [...line]),
			this.dot,
		);
	}

	private currentLine(): Cell[] {
		const line = this.lines[this.lines.length - 1];
		if (line === undefined) {
			const fresh: Cell[] = [];
			this.lines.push(fresh);
			return fresh;
		}
		return line;
	}

	private writeControl(char: string, style: Style): void {
		if (char === "\n") {
			this.newline();
			return;
		}
		const code = char.codePointAt(0) ?? 0;
		const caret = String.fromCharCode(code ^ 0x40);
		const inverted = mergeStyle(style, { inverse: true });
		this.writeCell("^", 1, inverted);
		this.writeCell(caret, 1, inverted);
	}

	private writeCell(text: string, width: number, style: Style): void {
		const line = this.currentLine();
		if (width === 0) {
			const last = line[line.length - 1];
			if (last !== undefined) {
				line[line.length - 1] = { text: last.text + text, width: last.width, style: last.style };
			} else {
				line.push({ text, width: 0, style });
			}
			return;
		}

		// Wrap, unless the line holds nothing but indentation already
		const onlyIndent = this.lines.length > 1 && this.col <= this.indent;
		if (this.col + width > this.width && this.col > 0 && !onlyIndent) {
			this.newline();
		}
		this.currentLine().push({ text, width, style });
		this.col += width;

		if (this.eagerWrap && this.col >= this.width) {
			this.newline();
		}
	}
}
