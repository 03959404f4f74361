import { ListingKeybindings, type ListingKeybindingsConfig } from "../keybindings.js";
import type { TermEvent } from "../keys.js";
import { BufferBuilder, type RenderBuffer, truncateToHeight } from "../render-buffer.js";
import { concat, plain, type StyledText, styled } from "../styled.js";
import { graphemes, isGraphic, truncateToWidth, visibleWidth } from "../utils.js";
import type { Widget } from "../widget.js";

const normalizeToSingleLine = (text: string): string => text.replace(/[\r\n]+/g, " ");

export interface ListingItem {
	text: string;
	selected: boolean;
}

/** The title of a mode, bold white on magenta, optionally followed by a space. */
export function modeLine(title: string, space: boolean): StyledText {
	const line = styled(title, "bold", "white", "bgMagenta");
	return space ? concat(line, plain(" ")) : line;
}

/**
 * Write a listing: the mode line, the filter with the dot after it, and one
 * row per item. Items are clipped to the width; a selected item is padded to
 * the full width and inverted.
 */
export function writeListing(builder: BufferBuilder, title: string, filter: string, items: readonly ListingItem[]): void {
	builder.writeStyled(modeLine(title, true));
	builder.newline().write(filter).setDotHere();

	for (const item of items) {
		builder.newline();
		const text = truncateToWidth(normalizeToSingleLine(item.text), builder.width);
		if (item.selected) {
			builder.write(text, { inverse: true }).writeSpaces(builder.width - visibleWidth(text), { inverse: true });
		} else {
			builder.write(text);
		}
	}
}

/**
 * Render a listing into at most `height` rows. Items scroll so that the
 * selected one stays visible.
 */
export function renderListing(
	width: number,
	height: number,
	title: string,
	filter: string,
	items: readonly ListingItem[],
): RenderBuffer {
	const rows = Math.max(0, height - 2);
	const selected = items.findIndex((item) => item.selected);
	const start = selected >= rows ? selected - rows + 1 : 0;

	const builder = new BufferBuilder(width);
	writeListing(builder, title, filter, items.slice(start, start + rows));
	return truncateToHeight(builder.buffer(), height);
}

export interface ListingWidgetOptions {
	title: string;
	items: readonly string[];
	/** Called with the selected item on confirm */
	onAccept?: (item: string, index: number) => void;
	/** Called on cancel */
	onClose?: () => void;
	keybindings?: ListingKeybindingsConfig;
}

/**
 * A filterable list. Typing narrows the items to those containing the filter
 * (case-insensitive); Up and Down move the selection, wrapping around.
 */
export class ListingWidget implements Widget {
	private readonly title: string;
	private readonly items: readonly string[];
	private readonly keybindings: ListingKeybindings;
	private filter = "";
	private filtered: { item: string; index: number }[];
	private selectedIndex = 0;

	public onAccept?: (item: string, index: number) => void;
	public onClose?: () => void;

	constructor(options: ListingWidgetOptions) {
		this.title = options.title;
		this.items = options.items;
		this.onAccept = options.onAccept;
		this.onClose = options.onClose;
		this.keybindings = new ListingKeybindings(options.keybindings);
		this.filtered = this.items.map((item, index) => ({ item, index }));
	}

	getFilter(): string {
		return this.filter;
	}

	setFilter(filter: string): void {
		this.filter = filter;
		const needle = filter.toLowerCase();
		this.filtered = this.items
			.map((item, index) => ({ item, index }))
			.filter(({ item }) => item.toLowerCase().includes(needle));
		// Reset selection when filter changes
		this.selectedIndex = 0;
	}

	/** Visible items, in order. */
	getFilteredItems(): string[] {
		return this.filtered.map(({ item }) => item);
	}

	getSelectedItem(): string | null {
		return this.filtered[this.selectedIndex]?.item ?? null;
	}

	render(width: number, height: number): RenderBuffer {
		const items = this.filtered.map(({ item }, i) => ({ text: item, selected: i === this.selectedIndex }));
		return renderListing(width, height, this.title, this.filter, items);
	}

	handle(event: TermEvent): boolean {
		if (event.type !== "key") return false;
		const key = event.key;
		const kb = this.keybindings;

		if (kb.matches(key, "selectUp")) {
			if (this.filtered.length > 0) {
				this.selectedIndex = this.selectedIndex === 0 ? this.filtered.length - 1 : this.selectedIndex - 1;
			}
			return true;
		}
		if (kb.matches(key, "selectDown")) {
			if (this.filtered.length > 0) {
				this.selectedIndex = this.selectedIndex === this.filtered.length - 1 ? 0 : this.selectedIndex + 1;
			}
			return true;
		}
		if (kb.matches(key, "selectConfirm")) {
			const selected = this.filtered[this.selectedIndex];
			if (selected && this.onAccept) {
				this.onAccept(selected.item, selected.index);
			}
			return true;
		}
		if (kb.matches(key, "selectCancel")) {
			this.onClose?.();
			return true;
		}
		if (kb.matches(key, "deleteFilterChar")) {
			this.setFilter(graphemes(this.filter).slice(0, -1).join(""));
			return true;
		}
		if (key.kind === "char" && key.mods === 0 && isGraphic(key.char)) {
			this.setFilter(this.filter + key.char);
			return true;
		}
		return false;
	}
}
