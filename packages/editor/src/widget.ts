import type { TermEvent } from "./keys.js";
import type { RenderBuffer } from "./render-buffer.js";

/** Something that can be drawn into a grid of at most `width` columns and `height` rows. */
export interface Renderer {
	render(width: number, height: number): RenderBuffer;
}

/**
 * Something that takes terminal events.
 * @returns whether the event was handled
 */
export interface Handler {
	handle(event: TermEvent): boolean;
}

/** The capability pair every interactive element provides. */
export interface Widget extends Renderer, Handler {}

/** A handler that handles nothing. */
export const dummyHandler: Handler = {
	handle: () => false,
};

/** Wrap a function as a Handler. */
export function funcHandler(fn: (event: TermEvent) => boolean): Handler {
	return { handle: fn };
}

/**
 * A widget whose events pass through an overlay handler first.
 * Rendering is left to the base widget.
 */
export class OverlayWidget implements Widget {
	constructor(
		readonly base: Widget,
		readonly overlay: Handler,
	) {}

	render(width: number, height: number): RenderBuffer {
		return this.base.render(width, height);
	}

	handle(event: TermEvent): boolean {
		return this.overlay.handle(event) || this.base.handle(event);
	}
}

/**
 * Give `overlay` first refusal on the events of `widget`. Wrapping an
 * already wrapped widget layers another overlay on top.
 */
export function addOverlayHandler(widget: Widget, overlay: Handler): Widget {
	return new OverlayWidget(widget, overlay);
}
