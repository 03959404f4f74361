import { applyPending, type CodeArea } from "./components/code-area.js";
import { type Key, type KeyId, matchesKey } from "./keys.js";
import type { Handler } from "./widget.js";

// Re-export KeyId from keys.ts
export type { KeyId };

/**
 * Keybindings configuration: one or more keys per action.
 */
export type KeybindingsConfig<A extends string> = {
	[K in A]?: KeyId | KeyId[];
};

/**
 * Maps actions to keys, starting from defaults overridden by configuration.
 */
export class KeybindingsManager<A extends string> {
	private actionToKeys: Map<A, KeyId[]>;

	constructor(
		private readonly defaults: Readonly<Record<A, KeyId | KeyId[]>>,
		config: KeybindingsConfig<A> = {},
	) {
		this.actionToKeys = new Map();
		this.buildMaps(config);
	}

	private buildMaps(config: KeybindingsConfig<A>): void {
		this.actionToKeys.clear();
		const actions = Object.keys(this.defaults).filter((action): action is A => action in this.defaults);

		for (const action of actions) {
			const keys = config[action] ?? this.defaults[action];
			this.actionToKeys.set(action, Array.isArray(keys) ? [...keys] : [keys]);
		}
	}

	/**
	 * Check if a key triggers a specific action.
	 */
	matches(key: Key, action: A): boolean {
		const keys = this.actionToKeys.get(action);
		if (!keys) return false;
		return keys.some((id) => matchesKey(key, id));
	}

	/**
	 * First action bound to `key`, in the order of the defaults.
	 */
	find(key: Key): A | undefined {
		for (const [action, keys] of this.actionToKeys) {
			if (keys.some((id) => matchesKey(key, id))) return action;
		}
		return undefined;
	}

	/**
	 * Get keys bound to an action.
	 */
	getKeys(action: A): KeyId[] {
		return this.actionToKeys.get(action) ?? [];
	}

	/**
	 * Update configuration.
	 */
	setConfig(config: KeybindingsConfig<A>): void {
		this.buildMaps(config);
	}
}

/**
 * Editing actions layered over a CodeArea.
 */
export type CodeAreaAction =
	// Cursor movement
	| "cursorLeft"
	| "cursorRight"
	| "cursorLineStart"
	| "cursorLineEnd"
	// Deletion
	| "deleteCharForward"
	| "deleteWordBackward"
	| "deleteToLineStart"
	| "deleteToLineEnd"
	// Pending code
	| "applyPending";

export type CodeAreaKeybindingsConfig = KeybindingsConfig<CodeAreaAction>;

export const DEFAULT_CODE_AREA_KEYBINDINGS: Readonly<Record<CodeAreaAction, KeyId | KeyId[]>> = {
	// Cursor movement
	cursorLeft: ["left", "ctrl+b"],
	cursorRight: ["right", "ctrl+f"],
	cursorLineStart: ["home", "ctrl+a"],
	cursorLineEnd: ["end", "ctrl+e"],
	// Deletion
	deleteCharForward: ["delete", "ctrl+d"],
	deleteWordBackward: ["ctrl+w", "alt+backspace"],
	deleteToLineStart: "ctrl+u",
	deleteToLineEnd: "ctrl+k",
	// Pending code
	applyPending: "tab",
};

/**
 * Actions of a ListingWidget.
 */
export type ListingAction = "selectUp" | "selectDown" | "selectConfirm" | "selectCancel" | "deleteFilterChar";

export type ListingKeybindingsConfig = KeybindingsConfig<ListingAction>;

export const DEFAULT_LISTING_KEYBINDINGS: Readonly<Record<ListingAction, KeyId | KeyId[]>> = {
	selectUp: "up",
	selectDown: "down",
	selectConfirm: "enter",
	selectCancel: ["escape", "ctrl+c"],
	deleteFilterChar: "backspace",
};

export class CodeAreaKeybindings extends KeybindingsManager<CodeAreaAction> {
	constructor(config: CodeAreaKeybindingsConfig = {}) {
		super(DEFAULT_CODE_AREA_KEYBINDINGS, config);
	}
}

export class ListingKeybindings extends KeybindingsManager<ListingAction> {
	constructor(config: ListingKeybindingsConfig = {}) {
		super(DEFAULT_LISTING_KEYBINDINGS, config);
	}
}

/**
 * A handler performing CodeAreaActions on `area`. Layer it with
 * addOverlayHandler(area, handler).
 *
 * applyPending only handles its key when there is pending code.
 */
export function createCodeAreaBindings(area: CodeArea, config: CodeAreaKeybindingsConfig = {}): Handler {
	const keybindings = new CodeAreaKeybindings(config);

	return {
		handle(event) {
			if (event.type !== "key") return false;
			const action = keybindings.find(event.key);
			if (action === undefined) return false;

			return area.mutateState((state) => {
				const buffer = state.buffer;
				switch (action) {
					case "cursorLeft":
						buffer.moveDotLeft();
						break;
					case "cursorRight":
						buffer.moveDotRight();
						break;
					case "cursorLineStart":
						buffer.moveDotToStart();
						break;
					case "cursorLineEnd":
						buffer.moveDotToEnd();
						break;
					case "deleteCharForward":
						buffer.deleteAfterDot();
						break;
					case "deleteWordBackward":
						buffer.deleteWordBeforeDot();
						break;
					case "deleteToLineStart":
						buffer.deleteToStart();
						break;
					case "deleteToLineEnd":
						buffer.deleteToEnd();
						break;
					case "applyPending":
						if (!state.pending) return false;
						applyPending(state);
						break;
				}
				return true;
			});
		},
	};
}
