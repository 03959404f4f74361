import assert from "node:assert";
import { describe, it } from "node:test";
import { charKey, functionKey, keyEvent, type TermEvent } from "../src/keys.js";
import { BufferBuilder, type RenderBuffer } from "../src/render-buffer.js";
import { addOverlayHandler, dummyHandler, funcHandler, type Widget } from "../src/widget.js";

class RecordingWidget implements Widget {
	handled: TermEvent[] = [];

	constructor(private readonly accepts: boolean) {}

	render(width: number, _height: number): RenderBuffer {
		return new BufferBuilder(width).write("base").buffer();
	}

	handle(event: TermEvent): boolean {
		this.handled.push(event);
		return this.accepts;
	}
}

const keyA = keyEvent(charKey("a"));

describe("addOverlayHandler", () => {
	it("renders the base widget unchanged", () => {
		const base = new RecordingWidget(false);
		const widget = addOverlayHandler(base, funcHandler(() => true));
		assert.deepStrictEqual(widget.render(10, 1).toPlainLines(), ["base"]);
	});

	it("reports handled without reaching the base when the overlay handles an event", () => {
		const base = new RecordingWidget(false);
		const widget = addOverlayHandler(base, funcHandler(() => true));
		assert.strictEqual(widget.handle(keyA), true);
		assert.deepStrictEqual(base.handled, []);
	});

	it("falls back to the base widget", () => {
		const base = new RecordingWidget(true);
		const widget = addOverlayHandler(base, dummyHandler);
		assert.strictEqual(widget.handle(keyA), true);
		assert.deepStrictEqual(base.handled, [keyA]);
	});

	it("reports unhandled when neither handles the event", () => {
		const widget = addOverlayHandler(new RecordingWidget(false), dummyHandler);
		assert.strictEqual(widget.handle(keyA), false);
	});

	it("gives the outermost overlay first refusal when nested", () => {
		const order: string[] = [];
		const base = new RecordingWidget(false);
		const inner = funcHandler((event) => {
			order.push("inner");
			return event.type === "key" && event.key.kind === "function";
		});
		const outer = funcHandler(() => {
			order.push("outer");
			return false;
		});
		const widget = addOverlayHandler(addOverlayHandler(base, inner), outer);

		assert.strictEqual(widget.handle(keyEvent(functionKey("up"))), true);
		assert.deepStrictEqual(order, ["outer", "inner"]);
		assert.deepStrictEqual(base.handled, []);

		assert.strictEqual(widget.handle(keyA), false);
		assert.deepStrictEqual(base.handled, [keyA]);
	});
});
