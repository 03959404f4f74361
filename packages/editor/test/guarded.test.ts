import assert from "node:assert";
import { describe, it } from "node:test";
import { Guarded } from "../src/guarded.js";

interface Counter {
	values: number[];
}

const copyCounter = (counter: Counter): Counter => ({ values: [...counter.values] });

describe("Guarded", () => {
	it("hands out independent snapshots", () => {
		const guarded = new Guarded<Counter>({ values: [1] }, copyCounter);
		const snapshot = guarded.snapshot();
		snapshot.values.push(2);
		assert.deepStrictEqual(guarded.snapshot(), { values: [1] });
	});

	it("commits a mutation and returns its result", () => {
		const guarded = new Guarded<Counter>({ values: [] }, copyCounter);
		const length = guarded.mutate((counter) => counter.values.push(7));
		assert.strictEqual(length, 1);
		assert.deepStrictEqual(guarded.snapshot(), { values: [7] });
	});

	it("discards a mutation that throws", () => {
		const guarded = new Guarded<Counter>({ values: [1] }, copyCounter);
		assert.throws(() =>
			guarded.mutate((counter) => {
				counter.values.push(2);
				throw new Error("abort");
			}),
		);
		assert.deepStrictEqual(guarded.snapshot(), { values: [1] });
	});

	it("rejects nested mutations", () => {
		const guarded = new Guarded<Counter>({ values: [] }, copyCounter);
		assert.throws(() => guarded.mutate(() => guarded.mutate(() => undefined)), /already being mutated/);
		// The guard is released afterwards
		guarded.mutate((counter) => counter.values.push(1));
		assert.deepStrictEqual(guarded.snapshot(), { values: [1] });
	});

	it("does not expose the value being mutated", () => {
		const guarded = new Guarded<Counter>({ values: [1] }, copyCounter);
		guarded.mutate((counter) => {
			counter.values.push(2);
			assert.deepStrictEqual(guarded.snapshot(), { values: [1] });
		});
		assert.deepStrictEqual(guarded.snapshot(), { values: [1, 2] });
	});
});
