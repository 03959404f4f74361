import assert from "node:assert";
import { describe, it } from "node:test";
import { constPrompt, type Highlighted, type Highlighter, LateUpdates } from "../src/async-source.js";
import { CodeBuffer } from "../src/code-buffer.js";
import { CodeArea, type CodeAreaConfig, type CodeAreaState } from "../src/components/code-area.js";
import { plain, styled } from "../src/styled.js";

function area(content: string, dot: number, config: CodeAreaConfig = {}, state: Partial<CodeAreaState> = {}): CodeArea {
	return new CodeArea(config, { ...state, buffer: new CodeBuffer(content, dot) });
}

function fixedHighlighter(highlight: (code: string) => Highlighted): Highlighter {
	return {
		get: highlight,
		trigger: () => {},
		lateUpdates: () => LateUpdates.closed<Highlighted>(),
	};
}

const prompt = constPrompt(plain("> "));

describe("CodeArea render", () => {
	it("writes the prompt and the code with the dot after the prompt", () => {
		const buffer = area("ls", 1, { prompt }).render(20, 10);
		assert.deepStrictEqual(buffer.toPlainLines(), ["> ls"]);
		assert.deepStrictEqual(buffer.dot, { line: 0, col: 3 });
	});

	it("indents continuation lines by the width of a short prompt", () => {
		const buffer = area("abcdefghij", 10, { prompt }).render(8, 10);
		assert.deepStrictEqual(buffer.toPlainLines(), ["> abcdef", "  ghij"]);
		assert.deepStrictEqual(buffer.dot, { line: 1, col: 6 });
	});

	it("indents lines after a newline in the code", () => {
		const buffer = area("a\nb", 3, { prompt }).render(20, 10);
		assert.deepStrictEqual(buffer.toPlainLines(), ["> a", "  b"]);
	});

	it("does not indent after a prompt taking half the width or more", () => {
		const buffer = area("abcd", 4, { prompt: constPrompt(plain("long> ")) }).render(8, 10);
		assert.deepStrictEqual(buffer.toPlainLines(), ["long> ab", "cd"]);
		assert.deepStrictEqual(buffer.dot, { line: 1, col: 2 });
	});

	it("moves the dot to the next row when the code fills a row", () => {
		const buffer = area("abcd", 4, { prompt }).render(6, 10);
		assert.deepStrictEqual(buffer.toPlainLines(), ["> abcd", "  "]);
		assert.deepStrictEqual(buffer.dot, { line: 1, col: 2 });
	});

	it("keeps the styles of highlighted code", () => {
		const highlighter = fixedHighlighter((code) => ({ text: styled(code, "green"), errors: [] }));
		const buffer = area("ls", 2, { highlighter }).render(20, 10);
		assert.deepStrictEqual(buffer.lines[0], [
			{ text: "l", width: 1, style: { fg: "green" } },
			{ text: "s", width: 1, style: { fg: "green" } },
		]);
	});

	it("shows each highlighting error on its own row", () => {
		const highlighter = fixedHighlighter((code) => ({
			text: plain(code),
			errors: [new Error("unbalanced ("), new Error("unknown command")],
		}));
		const buffer = area("echo (", 6, { prompt, highlighter }).render(20, 10);
		assert.deepStrictEqual(buffer.toPlainLines(), ["> echo (", "unbalanced (", "unknown command"]);
		assert.deepStrictEqual(buffer.dot, { line: 0, col: 8 });
	});

	describe("right prompt", () => {
		const rprompt = constPrompt(styled("RP", "inverse"));

		it("is right-aligned on the first row", () => {
			const buffer = area("ls", 2, { prompt, rprompt }).render(20, 10);
			assert.deepStrictEqual(buffer.toPlainLines(), [`> ls${" ".repeat(14)}RP`]);
			assert.deepStrictEqual(buffer.lines[0]?.[19], { text: "P", width: 1, style: { inverse: true } });
			assert.deepStrictEqual(buffer.dot, { line: 0, col: 4 });
		});

		it("needs at least one column of gap", () => {
			assert.deepStrictEqual(area("ls", 2, { prompt, rprompt }).render(7, 10).toPlainLines(), ["> ls RP"]);
			assert.deepStrictEqual(area("ls", 2, { prompt, rprompt }).render(6, 10).toPlainLines(), ["> ls"]);
		});

		it("makes room for control characters in caret notation", () => {
			const withControl = constPrompt(plain("r\tp"));
			const buffer = area("ls", 2, { prompt, rprompt: withControl }).render(20, 10);
			assert.deepStrictEqual(buffer.toPlainLines(), [`> ls${" ".repeat(12)}r^Ip`]);
		});

		it("is hidden on request", () => {
			const buffer = area("ls", 2, { prompt, rprompt }, { hideRPrompt: true }).render(20, 10);
			assert.deepStrictEqual(buffer.toPlainLines(), ["> ls"]);
		});
	});

	describe("pending code", () => {
		it("is shown underlined in place of its range with the dot after it", () => {
			const buffer = area("git ch", 6, {}, { pending: { from: 4, to: 6, content: "checkout" } }).render(30, 10);
			assert.deepStrictEqual(buffer.toPlainLines(), ["git checkout"]);
			assert.deepStrictEqual(buffer.dot, { line: 0, col: 12 });
			assert.deepStrictEqual(buffer.lines[0]?.[3]?.style, {});
			assert.deepStrictEqual(buffer.lines[0]?.[4]?.style, { underline: true });
			assert.deepStrictEqual(buffer.lines[0]?.[11]?.style, { underline: true });
		});

		it("is highlighted together with the code", () => {
			const seen: string[] = [];
			const highlighter = fixedHighlighter((code) => {
				seen.push(code);
				return { text: plain(code), errors: [] };
			});
			area("ls -", 4, { highlighter }, { pending: { from: 4, to: 4, content: "-all" } }).render(30, 10);
			assert.deepStrictEqual(seen, ["ls --all"]);
		});
	});

	describe("height", () => {
		it("drops rows from the bottom when the dot is near the top", () => {
			const buffer = area("aaaabbbbccccdddd", 0).render(4, 2);
			assert.deepStrictEqual(buffer.toPlainLines(), ["aaaa", "bbbb"]);
			assert.deepStrictEqual(buffer.dot, { line: 0, col: 0 });
		});

		it("drops rows from the top to keep the dot row visible", () => {
			const buffer = area("aaaabbbbccccdddd", 16).render(4, 2);
			assert.deepStrictEqual(buffer.toPlainLines(), ["dddd", ""]);
			assert.deepStrictEqual(buffer.dot, { line: 1, col: 0 });
		});

		it("ends with the dot row when it lies past the height", () => {
			const buffer = area("aaaabbbbccccdddd", 9).render(4, 2);
			assert.deepStrictEqual(buffer.toPlainLines(), ["bbbb", "cccc"]);
			assert.deepStrictEqual(buffer.dot, { line: 1, col: 1 });
		});
	});

	it("does not change the state", () => {
		const widget = area("ls", 1, { prompt });
		widget.render(1, 1);
		const { buffer } = widget.copyState();
		assert.deepStrictEqual([buffer.content, buffer.dot], ["ls", 1]);
	});
});
