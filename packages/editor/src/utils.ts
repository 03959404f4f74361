import { eastAsianWidth } from "get-east-asian-width";

// Grapheme segmenter (shared instance)
const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/**
 * Get the shared grapheme segmenter instance.
 */
export function getSegmenter(): Intl.Segmenter {
	return segmenter;
}

/**
 * Split a string into grapheme clusters.
 */
export function graphemes(str: string): string[] {
	const result: string[] = [];
	for (const { segment } of segmenter.segment(str)) {
		result.push(segment);
	}
	return result;
}

const controlRegex = /^\p{Cc}+$/u;
const zeroWidthRegex = /^(?:\p{Default_Ignorable_Code_Point}|\p{Control}|\p{Mark}|\p{Surrogate})+$/u;
const leadingNonPrintingRegex = /^[\p{Default_Ignorable_Code_Point}\p{Control}\p{Format}\p{Mark}\p{Surrogate}]+/u;
const emojiPresentationRegex = /\p{Emoji_Presentation}/u;
const pictographicRegex = /\p{Extended_Pictographic}/u;
const graphicRegex = /^[\p{L}\p{M}\p{N}\p{P}\p{S}\p{Zs}]$/u;

/**
 * Check if a grapheme cluster is drawn as a double-width emoji.
 * Emoji_Presentation characters always are; text-default pictographs only with
 * VS16 or inside a ZWJ sequence.
 */
function isWideEmoji(segment: string): boolean {
	if (emojiPresentationRegex.test(segment)) return true;
	return pictographicRegex.test(segment) && (segment.includes("\uFE0F") || segment.includes("\u200D"));
}

const WIDTH_CACHE_SIZE = 512;
const widthCache = new Map<string, number>();

/**
 * Calculate the terminal width of a single grapheme cluster.
 */
export function graphemeWidth(segment: string): number {
	// Control characters are drawn in caret notation ("^I"); "\n" breaks the line
	if (controlRegex.test(segment)) {
		return segment.replace(/\n/g, "").length * 2;
	}

	if (segment.length === 0 || zeroWidthRegex.test(segment)) {
		return 0;
	}

	if (isWideEmoji(segment)) {
		return 2;
	}

	const base = segment.replace(leadingNonPrintingRegex, "");
	const cp = base.codePointAt(0);
	if (cp === undefined) {
		return 0;
	}

	let width = eastAsianWidth(cp);

	// Trailing halfwidth/fullwidth forms
	for (const char of base.slice(cp > 0xffff ? 2 : 1)) {
		const c = char.codePointAt(0);
		if (c !== undefined && c >= 0xff00 && c <= 0xffef) {
			width += eastAsianWidth(c);
		}
	}

	return width;
}

/**
 * Calculate the visible width of plain (unstyled) text in terminal columns.
 */
export function visibleWidth(str: string): number {
	if (str.length === 0) {
		return 0;
	}

	// Fast path: pure ASCII printable
	let isPureAscii = true;
	for (let i = 0; i < str.length; i++) {
		const code = str.charCodeAt(i);
		if (code < 0x20 || code > 0x7e) {
			isPureAscii = false;
			break;
		}
	}
	if (isPureAscii) {
		return str.length;
	}

	const cached = widthCache.get(str);
	if (cached !== undefined) {
		return cached;
	}

	let width = 0;
	for (const { segment } of segmenter.segment(str)) {
		width += graphemeWidth(segment);
	}

	if (widthCache.size >= WIDTH_CACHE_SIZE) {
		const firstKey = widthCache.keys().next().value;
		if (firstKey !== undefined) {
			widthCache.delete(firstKey);
		}
	}
	widthCache.set(str, width);

	return width;
}

/**
 * Truncate plain text so that it occupies at most `maxWidth` columns.
 * A wide grapheme that would straddle the limit is dropped entirely.
 */
export function truncateToWidth(str: string, maxWidth: number): string {
	if (maxWidth <= 0) return "";
	if (visibleWidth(str) <= maxWidth) return str;

	let result = "";
	let width = 0;
	for (const { segment } of segmenter.segment(str)) {
		const w = graphemeWidth(segment);
		if (width + w > maxWidth) break;
		result += segment;
		width += w;
	}
	return result;
}

/**
 * Whether a single codepoint is graphic: a letter, mark, number, punctuation,
 * symbol or space separator.
 */
export function isGraphic(char: string): boolean {
	return graphicRegex.test(char);
}

/**
 * Check if a character is whitespace.
 */
export function isWhitespaceChar(char: string): boolean {
	return /\s/.test(char);
}
