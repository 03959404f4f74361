import {
	type BackgroundColorName,
	backgroundColorNames,
	type ChalkInstance,
	type ForegroundColorName,
	foregroundColorNames,
} from "chalk";
import { visibleWidth } from "./utils.js";

/** Boolean text attributes a style can switch on. */
export type StyleFlag = "bold" | "dim" | "italic" | "underline" | "inverse" | "strikethrough";

export const STYLE_FLAGS: readonly StyleFlag[] = ["bold", "dim", "italic", "underline", "inverse", "strikethrough"];

/**
 * Style of a run of text. Colours use chalk's names, e.g. "red",
 * "blueBright", "bgMagenta".
 */
export interface Style {
	fg?: ForegroundColorName;
	bg?: BackgroundColorName;
	bold?: boolean;
	dim?: boolean;
	italic?: boolean;
	underline?: boolean;
	inverse?: boolean;
	strikethrough?: boolean;
}

export interface Segment {
	readonly text: string;
	readonly style: Style;
}

/** Text made of styled segments. */
export type StyledText = readonly Segment[];

function isStyleFlag(name: string): name is StyleFlag {
	return STYLE_FLAGS.some((flag) => flag === name);
}

function isForegroundColor(name: string): name is ForegroundColorName {
	return foregroundColorNames.some((color) => color === name);
}

function isBackgroundColor(name: string): name is BackgroundColorName {
	return backgroundColorNames.some((color) => color === name);
}

/**
 * Build a style from names: flags ("bold", "inverse", ...), a foreground
 * colour ("red") and a background colour ("bgRed"). Later names override
 * earlier colours.
 *
 * @throws Error on an unknown name
 */
export function parseStyle(...names: string[]): Style {
	const style: Style = {};
	for (const name of names) {
		if (isStyleFlag(name)) {
			style[name] = true;
		} else if (isForegroundColor(name)) {
			style.fg = name;
		} else if (isBackgroundColor(name)) {
			style.bg = name;
		} else {
			throw new Error(`Unknown style "${name}"`);
		}
	}
	return style;
}

/** Overlay `extra` on `base`: colours in `extra` win, flags accumulate. */
export function mergeStyle(base: Style, extra: Style): Style {
	const merged: Style = { ...base };
	if (extra.fg) merged.fg = extra.fg;
	if (extra.bg) merged.bg = extra.bg;
	for (const flag of STYLE_FLAGS) {
		if (extra[flag]) merged[flag] = true;
	}
	return merged;
}

export function styleEquals(a: Style, b: Style): boolean {
	if (a.fg !== b.fg || a.bg !== b.bg) return false;
	return STYLE_FLAGS.every((flag) => Boolean(a[flag]) === Boolean(b[flag]));
}

/** Apply a style to a string with the given chalk instance. */
export function applyStyle(chalk: ChalkInstance, style: Style, text: string): string {
	let painter = chalk;
	if (style.fg) painter = painter[style.fg];
	if (style.bg) painter = painter[style.bg];
	for (const flag of STYLE_FLAGS) {
		if (style[flag]) painter = painter[flag];
	}
	return painter === chalk ? text : painter(text);
}

export function plain(text: string): StyledText {
	return text.length > 0 ? [{ text, style: {} }] : [];
}

export function styled(text: string, ...styleNames: string[]): StyledText {
	return text.length > 0 ? [{ text, style: parseStyle(...styleNames) }] : [];
}

/** Apply additional style names to every segment. */
export function transform(text: StyledText, ...styleNames: string[]): StyledText {
	const extra = parseStyle(...styleNames);
	return text.map((segment) => ({ text: segment.text, style: mergeStyle(segment.style, extra) }));
}

export function concat(...texts: StyledText[]): StyledText {
	return texts.flat();
}

export function toPlain(text: StyledText): string {
	return text.map((segment) => segment.text).join("");
}

export function styledWidth(text: StyledText): number {
	let width = 0;
	for (const segment of text) {
		width += visibleWidth(segment.text);
	}
	return width;
}

/**
 * Split styled text at the given offsets (UTF-16 code units into its plain
 * text, ascending). Returns offsets.length + 1 parts.
 */
export function partition(text: StyledText, ...offsets: number[]): StyledText[] {
	const parts: Segment[][] = [[]];
	let consumed = 0;
	let next = 0;

	for (const segment of text) {
		let rest = segment.text;
		let restStart = consumed;
		while (next < offsets.length) {
			const cut = offsets[next] ?? 0;
			if (cut > restStart + rest.length) break;
			const head = rest.slice(0, Math.max(0, cut - restStart));
			if (head.length > 0) {
				parts[parts.length - 1]?.push({ text: head, style: segment.style });
			}
			rest = rest.slice(head.length);
			restStart += head.length;
			parts.push([]);
			next++;
		}
		if (rest.length > 0) {
			parts[parts.length - 1]?.push({ text: rest, style: segment.style });
		}
		consumed += segment.text.length;
	}

	while (parts.length < offsets.length + 1) {
		parts.push([]);
	}
	return parts;
}
