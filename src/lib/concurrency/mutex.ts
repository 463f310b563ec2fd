/**
 * A minimal mutex that serializes async functions.
 * Release happens even if the callback throws.
 */
export class Mutex {
	private chain: Promise<void> = Promise.resolve();

	/** Acquires the lock, runs `fn`, then releases. */
	async lock<T>(fn: () => Promise<T>): Promise<T> {
		let release: () => void = () => {};
		const gate = new Promise<void>((resolve) => {
			release = resolve;
		});

		const prev = this.chain;
		this.chain = prev.then(() => gate);

		await prev;
		try {
			return await fn();
		} finally {
			release();
		}
	}
}
