/**
 * Terminal input events and key decoding.
 *
 * Supports legacy terminal sequences, xterm modifier forms and the Kitty
 * keyboard protocol (CSI u). See: https://sw.kovidgoyal.net/kitty/keyboard-protocol/
 *
 * API:
 * - decodeKey(sequence) - Decode one complete input sequence into a Key
 * - keyId(key) - Name of a key, e.g. "ctrl+a", "alt+backspace", "enter", "x"
 * - matchesKey(key, keyId) - Check if a key matches a key identifier
 * - isFunctionKey(key) - Named function key or any key with modifiers
 */

// =============================================================================
// Types
// =============================================================================

/** Modifier bits, as used by the Kitty protocol (minus one). */
export const MODIFIERS = {
	shift: 1,
	alt: 2,
	ctrl: 4,
} as const;

const LOCK_MASK = 64 + 128; // Caps Lock + Num Lock

export type FunctionKeyName =
	| "enter"
	| "tab"
	| "backspace"
	| "escape"
	| "delete"
	| "insert"
	| "clear"
	| "home"
	| "end"
	| "pageUp"
	| "pageDown"
	| "up"
	| "down"
	| "left"
	| "right"
	| "f1"
	| "f2"
	| "f3"
	| "f4"
	| "f5"
	| "f6"
	| "f7"
	| "f8"
	| "f9"
	| "f10"
	| "f11"
	| "f12";

/** A key press: a single codepoint, or a named function key, with modifier bits. */
export type Key =
	| { readonly kind: "char"; readonly char: string; readonly mods: number }
	| { readonly kind: "function"; readonly name: FunctionKeyName; readonly mods: number };

/**
 * An event delivered by the terminal: a key press, or a bracketed-paste
 * boundary (`start: true` for ESC[200~, `false` for ESC[201~).
 */
export type TermEvent = { readonly type: "key"; readonly key: Key } | { readonly type: "paste"; readonly start: boolean };

/**
 * Key identifier: modifiers joined with "+" before a key name, e.g. "ctrl+a",
 * "alt+backspace", "shift+tab", "enter", "space", "x".
 */
export type KeyId = string;

export function charKey(char: string, mods = 0): Key {
	return { kind: "char", char, mods };
}

export function functionKey(name: FunctionKeyName, mods = 0): Key {
	return { kind: "function", name, mods };
}

export function keyEvent(key: Key): TermEvent {
	return { type: "key", key };
}

export function pasteEvent(start: boolean): TermEvent {
	return { type: "paste", start };
}

/** A named function key, or any key pressed with modifiers. */
export function isFunctionKey(key: Key): boolean {
	return key.kind === "function" || key.mods !== 0;
}

function withMods(key: Key, mods: number): Key {
	return key.kind === "char" ? charKey(key.char, key.mods | mods) : functionKey(key.name, key.mods | mods);
}

// =============================================================================
// Key identifiers
// =============================================================================

function modPrefix(mods: number): string {
	let prefix = "";
	if (mods & MODIFIERS.shift) prefix += "shift+";
	if (mods & MODIFIERS.ctrl) prefix += "ctrl+";
	if (mods & MODIFIERS.alt) prefix += "alt+";
	return prefix;
}

/**
 * Name a key. Modifiers come in the order shift, ctrl, alt.
 */
export function keyId(key: Key): KeyId {
	const name = key.kind === "function" ? key.name : key.char === " " ? "space" : key.char;
	return modPrefix(key.mods) + name;
}

function parseKeyId(id: KeyId): { name: string; mods: number } | null {
	// A trailing "+" is the plus key itself, e.g. "ctrl++"
	const parts = id.endsWith("++") ? [...id.slice(0, -2).split("+"), "+"] : id.split("+");
	const name = parts[parts.length - 1];
	if (!name) return null;
	let mods = 0;
	for (const part of parts.slice(0, -1)) {
		const modifier = part.toLowerCase();
		if (modifier === "shift") mods |= MODIFIERS.shift;
		else if (modifier === "alt") mods |= MODIFIERS.alt;
		else if (modifier === "ctrl") mods |= MODIFIERS.ctrl;
		else return null;
	}
	return { name, mods };
}

/**
 * Check if a key matches a key identifier. Function key names compare
 * case-insensitively ("pageup" matches "pageUp"); characters compare exactly.
 */
export function matchesKey(key: Key, id: KeyId): boolean {
	const parsed = parseKeyId(id);
	if (!parsed || parsed.mods !== key.mods) return false;
	if (key.kind === "function") {
		return parsed.name.toLowerCase() === key.name.toLowerCase();
	}
	if (key.char === " ") {
		return parsed.name === "space" || parsed.name === " ";
	}
	return parsed.name === key.char;
}

// =============================================================================
// Decoding
// =============================================================================

const CODEPOINTS = {
	escape: 27,
	tab: 9,
	enter: 13,
	backspace: 127,
	ctrlH: 8,
	kpEnter: 57414, // Numpad Enter (Kitty protocol)
} as const;

const LEGACY_SEQUENCES: Record<string, Key> = {
	"\x1b[A": functionKey("up"),
	"\x1b[B": functionKey("down"),
	"\x1b[C": functionKey("right"),
	"\x1b[D": functionKey("left"),
	"\x1bOA": functionKey("up"),
	"\x1bOB": functionKey("down"),
	"\x1bOC": functionKey("right"),
	"\x1bOD": functionKey("left"),
	"\x1b[H": functionKey("home"),
	"\x1b[F": functionKey("end"),
	"\x1bOH": functionKey("home"),
	"\x1bOF": functionKey("end"),
	"\x1b[E": functionKey("clear"),
	"\x1bOE": functionKey("clear"),
	"\x1bOM": functionKey("enter"),
	"\x1bOP": functionKey("f1"),
	"\x1bOQ": functionKey("f2"),
	"\x1bOR": functionKey("f3"),
	"\x1bOS": functionKey("f4"),
	"\x1b[Z": functionKey("tab", MODIFIERS.shift),
	"\x1b[a": functionKey("up", MODIFIERS.shift),
	"\x1b[b": functionKey("down", MODIFIERS.shift),
	"\x1b[c": functionKey("right", MODIFIERS.shift),
	"\x1b[d": functionKey("left", MODIFIERS.shift),
	"\x1bOa": functionKey("up", MODIFIERS.ctrl),
	"\x1bOb": functionKey("down", MODIFIERS.ctrl),
	"\x1bOc": functionKey("right", MODIFIERS.ctrl),
	"\x1bOd": functionKey("left", MODIFIERS.ctrl),
};

const CSI_FINAL_KEYS: Record<string, FunctionKeyName> = {
	A: "up",
	B: "down",
	C: "right",
	D: "left",
	H: "home",
	F: "end",
	E: "clear",
	P: "f1",
	Q: "f2",
	R: "f3",
	S: "f4",
};

const TILDE_KEYS: Record<number, FunctionKeyName> = {
	1: "home",
	2: "insert",
	3: "delete",
	4: "end",
	5: "pageUp",
	6: "pageDown",
	7: "home",
	8: "end",
	11: "f1",
	12: "f2",
	13: "f3",
	14: "f4",
	15: "f5",
	17: "f6",
	18: "f7",
	19: "f8",
	20: "f9",
	21: "f10",
	23: "f11",
	24: "f12",
};

// Kitty protocol private-use codepoints for functional keys
const KITTY_FUNCTIONAL_KEYS: Record<number, FunctionKeyName> = {
	[CODEPOINTS.kpEnter]: "enter",
	57348: "insert",
	57349: "delete",
	57350: "left",
	57351: "right",
	57352: "up",
	57353: "down",
	57354: "pageUp",
	57355: "pageDown",
	57356: "home",
	57357: "end",
};

/** Key for a codepoint reported by CSI u or modifyOtherKeys. */
function keyFromCodepoint(codepoint: number, mods: number): Key | undefined {
	switch (codepoint) {
		case CODEPOINTS.escape:
			return functionKey("escape", mods);
		case CODEPOINTS.tab:
			return functionKey("tab", mods);
		case CODEPOINTS.enter:
			return functionKey("enter", mods);
		case CODEPOINTS.backspace:
		case CODEPOINTS.ctrlH:
			return functionKey("backspace", mods);
	}
	const functional = KITTY_FUNCTIONAL_KEYS[codepoint];
	if (functional) return functionKey(functional, mods);
	if (codepoint < 32 || codepoint > 0x10ffff || (codepoint >= 0xd800 && codepoint <= 0xdfff)) {
		return undefined;
	}
	return charKey(String.fromCodePoint(codepoint), mods);
}

function decodeKitty(data: string): Key | undefined {
	// \x1b[<codepoint>[:<shifted>[:<base>]][;<mod>[:<event>]]u
	const match = data.match(/^\x1b\[(\d+)(?::(\d*))?(?::(\d+))?(?:;(\d+))?(?::(\d+))?u$/);
	if (!match) return undefined;

	// Release events carry no input
	if (match[5] === "3") return undefined;

	const codepoint = Number.parseInt(match[1] ?? "", 10);
	const shifted = match[2] ? Number.parseInt(match[2], 10) : undefined;
	const modValue = match[4] ? Number.parseInt(match[4], 10) : 1;
	let mods = (modValue - 1) & ~LOCK_MASK;

	// Prefer the shifted codepoint when Shift produced a printable character
	let effective = codepoint;
	if (mods & MODIFIERS.shift && shifted !== undefined && shifted >= 32) {
		effective = shifted;
		mods &= ~MODIFIERS.shift;
	}
	// Shortcuts on non-Latin layouts use the base layout (PC-101) key
	const base = match[3] ? Number.parseInt(match[3], 10) : undefined;
	if (base !== undefined && effective > 127 && mods & (MODIFIERS.ctrl | MODIFIERS.alt)) {
		effective = base;
	}
	return keyFromCodepoint(effective, mods);
}

function decodeModifyOtherKeys(data: string): Key | undefined {
	const match = data.match(/^\x1b\[27;(\d+);(\d+)~$/);
	if (!match) return undefined;
	const mods = (Number.parseInt(match[1] ?? "1", 10) - 1) & ~LOCK_MASK;
	return keyFromCodepoint(Number.parseInt(match[2] ?? "", 10), mods);
}

function decodeCsi(data: string): Key | undefined {
	// Arrows, home/end and F1-F4 with modifiers: \x1b[1;<mod>[:<event>]X
	const finalMatch = data.match(/^\x1b\[1;(\d+)(?::(\d+))?([A-HPQRS])$/);
	if (finalMatch) {
		if (finalMatch[2] === "3") return undefined;
		const name = CSI_FINAL_KEYS[finalMatch[3] ?? ""];
		if (!name) return undefined;
		return functionKey(name, (Number.parseInt(finalMatch[1] ?? "1", 10) - 1) & ~LOCK_MASK);
	}

	// \x1b[<num>~ or \x1b[<num>;<mod>[:<event>]~
	const tildeMatch = data.match(/^\x1b\[(\d+)(?:;(\d+))?(?::(\d+))?~$/);
	if (tildeMatch) {
		if (tildeMatch[3] === "3") return undefined;
		const name = TILDE_KEYS[Number.parseInt(tildeMatch[1] ?? "", 10)];
		if (!name) return undefined;
		const modValue = tildeMatch[2] ? Number.parseInt(tildeMatch[2], 10) : 1;
		return functionKey(name, (modValue - 1) & ~LOCK_MASK);
	}

	return undefined;
}

/** Control characters and single codepoints. */
function decodeSingle(data: string): Key | undefined {
	if (data === "\r" || data === "\n") return functionKey("enter");
	if (data === "\t") return functionKey("tab");
	if (data === "\x7f" || data === "\b") return functionKey("backspace");
	if (data === "\x1b") return functionKey("escape");
	if (data === "\x00") return charKey(" ", MODIFIERS.ctrl);

	const codepoint = data.codePointAt(0);
	if (codepoint === undefined || String.fromCodePoint(codepoint) !== data) return undefined;

	if (codepoint >= 1 && codepoint <= 26) {
		return charKey(String.fromCharCode(codepoint + 96), MODIFIERS.ctrl);
	}
	if (codepoint >= 0x1c && codepoint <= 0x1f) {
		return charKey(String.fromCharCode(codepoint + 0x40), MODIFIERS.ctrl);
	}
	return charKey(data);
}

/**
 * Decode one complete input sequence.
 *
 * @param data - A single sequence as split by TermReader
 * @returns The key, or undefined for unrecognized sequences and key releases
 */
export function decodeKey(data: string): Key | undefined {
	if (data.length === 0) return undefined;
	if (!data.startsWith("\x1b") || data === "\x1b") return decodeSingle(data);

	const legacy = LEGACY_SEQUENCES[data];
	if (legacy) return legacy;

	const decoded = decodeKitty(data) ?? decodeModifyOtherKeys(data) ?? decodeCsi(data);
	if (decoded) return decoded;

	// ESC followed by a single key: Alt (meta) prefix
	const rest = data.slice(1);
	if (!rest.startsWith("[") || rest === "[") {
		const inner = decodeSingle(rest);
		if (inner) return withMods(inner, MODIFIERS.alt);
	}

	return undefined;
}
