/**
 * Per-key mutual exclusion
 *
 * Work queued under the same key runs strictly one at a time, in submission
 * order; different keys never wait on each other. Each key holds a promise
 * chain whose tail is the last queued task.
 */

export class KeyedLock {
	private readonly tails = new Map<string, Promise<void>>();

	async run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		const current = previous.then(() => fn());
		// The tail only orders work; failures surface through `current`
		const tail = current.then(
			() => undefined,
			() => undefined,
		);
		this.tails.set(key, tail);

		try {
			return await current;
		} finally {
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	/**
	 * Keys with queued or running work
	 */
	activeKeys(): string[] {
		return Array.from(this.tails.keys());
	}
}
