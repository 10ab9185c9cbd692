/**
 * Keyed Mutex
 *
 * Serializes async work per key within one process. Work on different keys
 * runs concurrently; work on the same key runs in arrival order.
 */
export class KeyedMutex {
	private readonly tails = new Map<string, Promise<void>>();

	/**
	 * Runs `work` once every key in `keys` is free.
	 *
	 * Keys are acquired in sorted order so that two callers asking for the
	 * same set never wait on each other in a cycle.
	 */
	async runExclusive<T>(
		keys: string | string[],
		work: () => Promise<T>,
	): Promise<T> {
		const ordered = [...new Set(Array.isArray(keys) ? keys : [keys])].sort();
		const releases: Array<() => void> = [];
		try {
			for (const key of ordered) {
				releases.push(await this.acquire(key));
			}
			return await work();
		} finally {
			for (const release of releases.reverse()) {
				release();
			}
		}
	}

	private async acquire(key: string): Promise<() => void> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		let release: () => void = () => undefined;
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.tails.set(key, tail);
		await previous;
		return () => {
			release();
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		};
	}
}

export const escrowLockKey = (escrowId: string) => `escrow:${escrowId}`;
export const GOVERNANCE_LOCK_KEY = "governance";
