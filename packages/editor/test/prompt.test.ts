import assert from "node:assert";
import { describe, it } from "node:test";
import { AsyncPrompt } from "../src/prompt.js";
import { plain, type StyledText } from "../src/styled.js";
import { Deferred, sleep, tick } from "./helpers.js";

describe("AsyncPrompt", () => {
	it("shows the initial prompt until the first computation", () => {
		const prompt = new AsyncPrompt({ compute: () => plain("$ "), initial: plain("> ") });
		assert.deepStrictEqual(prompt.get(), plain("> "));
		prompt.trigger(true);
		assert.deepStrictEqual(prompt.get(), plain("$ "));
	});

	it("delivers a synchronous result as a late update", async () => {
		const prompt = new AsyncPrompt({ compute: () => plain("$ ") });
		prompt.trigger(true);
		assert.deepStrictEqual(await prompt.lateUpdates().next(), { value: plain("$ "), done: false });
	});

	describe("eagerness", () => {
		function counting(eagerness: number, cwd: { path: string }) {
			let calls = 0;
			const prompt = new AsyncPrompt({
				compute: () => {
					calls++;
					return plain(`${calls}> `);
				},
				eagerness,
				cwd: () => cwd.path,
			});
			return { prompt, calls: () => calls };
		}

		it("recomputes only when forced below 5", () => {
			const { prompt, calls } = counting(0, { path: "/tmp" });
			prompt.trigger(false);
			assert.strictEqual(calls(), 0);
			prompt.trigger(true);
			assert.strictEqual(calls(), 1);
		});

		it("recomputes when the working directory changed from 5", () => {
			const cwd = { path: "/tmp" };
			const { prompt, calls } = counting(5, cwd);
			prompt.trigger(false);
			assert.strictEqual(calls(), 1);
			prompt.trigger(false);
			assert.strictEqual(calls(), 1);
			cwd.path = "/home";
			prompt.trigger(false);
			assert.strictEqual(calls(), 2);
			prompt.trigger(true);
			assert.strictEqual(calls(), 3);
		});

		it("always recomputes from 10", () => {
			const { prompt, calls } = counting(10, { path: "/tmp" });
			prompt.trigger(false);
			prompt.trigger(false);
			assert.strictEqual(calls(), 2);
		});
	});

	it("folds triggers during a computation into one follow-up", async () => {
		const pending: Deferred<StyledText>[] = [];
		const prompt = new AsyncPrompt({
			compute: () => {
				const next = new Deferred<StyledText>();
				pending.push(next);
				return next.promise;
			},
		});

		prompt.trigger(true);
		prompt.trigger(true);
		prompt.trigger(true);
		assert.strictEqual(pending.length, 1);

		pending[0]?.resolve(plain("a> "));
		await tick();
		assert.deepStrictEqual(prompt.get(), plain("a> "));
		assert.strictEqual(pending.length, 2);

		pending[1]?.resolve(plain("b> "));
		await tick();
		assert.strictEqual(pending.length, 2);
		assert.deepStrictEqual(prompt.get(), plain("b> "));
		assert.deepStrictEqual(await prompt.lateUpdates().next(), { value: plain("b> "), done: false });
	});

	it("marks the previous prompt stale when a computation is slow", async () => {
		const slow = new Deferred<StyledText>();
		const prompt = new AsyncPrompt({
			compute: () => slow.promise,
			initial: plain("~> "),
			staleThreshold: 5,
		});

		prompt.trigger(true);
		await sleep(30);
		const stale = [{ text: "~> ", style: { dim: true } }];
		assert.deepStrictEqual(prompt.get(), stale);
		assert.deepStrictEqual(await prompt.lateUpdates().next(), { value: stale, done: false });

		slow.resolve(plain("/tmp> "));
		await tick();
		assert.deepStrictEqual(prompt.get(), plain("/tmp> "));
	});

	it("uses a custom stale transform", async () => {
		const slow = new Deferred<StyledText>();
		const prompt = new AsyncPrompt({
			compute: () => slow.promise,
			initial: plain("> "),
			staleThreshold: 5,
			staleTransform: (text) => [...text, { text: "…", style: {} }],
		});

		prompt.trigger(true);
		await sleep(30);
		assert.deepStrictEqual(prompt.get(), [
			{ text: "> ", style: {} },
			{ text: "…", style: {} },
		]);
		slow.resolve(plain("> "));
		await tick();
	});

	it("keeps the previous prompt when a computation fails", async () => {
		let fail = false;
		const failing = new Deferred<StyledText>();
		const prompt = new AsyncPrompt({
			compute: () => (fail ? failing.promise : plain("ok> ")),
		});

		prompt.trigger(true);
		fail = true;
		prompt.trigger(true);
		failing.reject(new Error("git status failed"));
		await tick();
		assert.deepStrictEqual(prompt.get(), plain("ok> "));
	});

	it("keeps the previous prompt when a computation throws", () => {
		const prompt = new AsyncPrompt({
			compute: () => {
				throw new Error("no prompt");
			},
			initial: plain("> "),
		});
		prompt.trigger(true);
		assert.deepStrictEqual(prompt.get(), plain("> "));
	});

	it("drops results after close", async () => {
		const slow = new Deferred<StyledText>();
		const prompt = new AsyncPrompt({ compute: () => slow.promise, initial: plain("> ") });
		prompt.trigger(true);
		prompt.close();
		slow.resolve(plain("late> "));
		await tick();
		assert.deepStrictEqual(prompt.get(), plain("> "));
		assert.strictEqual((await prompt.lateUpdates().next()).done, true);
	});
});
