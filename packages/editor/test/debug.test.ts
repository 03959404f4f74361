import assert from "node:assert";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, it } from "node:test";
import { DEBUG_LOG_ENV, debugLog } from "../src/debug.js";

describe("debugLog", () => {
	let dir: string;
	let previous: string | undefined;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "lineweave-debug-"));
		previous = process.env[DEBUG_LOG_ENV];
	});

	afterEach(() => {
		if (previous === undefined) {
			delete process.env[DEBUG_LOG_ENV];
		} else {
			process.env[DEBUG_LOG_ENV] = previous;
		}
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("appends timestamped records to the configured file", () => {
		const logPath = path.join(dir, "nested", "debug.log");
		process.env[DEBUG_LOG_ENV] = logPath;
		debugLog("prompt", "computation failed: boom");
		debugLog("highlighter", "highlight failed: bad");

		const lines = fs.readFileSync(logPath, "utf-8").split("\n");
		assert.strictEqual(lines.length, 3);
		assert.match(lines[0] ?? "", /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] prompt: computation failed: boom$/);
		assert.match(lines[1] ?? "", /^\[[^\]]+\] highlighter: highlight failed: bad$/);
		assert.strictEqual(lines[2], "");
	});

	it("writes nothing when the variable is unset", () => {
		delete process.env[DEBUG_LOG_ENV];
		debugLog("prompt", "ignored");
		assert.deepStrictEqual(fs.readdirSync(dir), []);
	});
});
