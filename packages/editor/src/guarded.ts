/**
 * Holds a value that is read through copies and changed through exclusive
 * copy-on-write mutations.
 *
 * A mutation runs against a copy that replaces the held value only when the
 * callback returns, so a snapshot taken at any time sees either the old or the
 * new value, never one in between. Callbacks must be synchronous.
 */
export class Guarded<S> {
	private value: S;
	private mutating = false;

	constructor(
		initial: S,
		private readonly copy: (value: S) => S,
	) {
		this.value = copy(initial);
	}

	snapshot(): S {
		return this.copy(this.value);
	}

	/**
	 * Run `f` on a copy of the value and commit the copy. If `f` throws, the
	 * held value is unchanged.
	 *
	 * @throws Error when called from within another mutation
	 */
	mutate<R>(f: (value: S) => R): R {
		if (this.mutating) {
			throw new Error("State is already being mutated");
		}
		this.mutating = true;
		try {
			const draft = this.copy(this.value);
			const result = f(draft);
			this.value = draft;
			return result;
		} finally {
			this.mutating = false;
		}
	}
}
