export type ExistenceState = "exists" | "missing" | "unknown";

/**
 * What the remote store is known to hold, by device asset id.
 *
 * An id is either pending (queued for a check, possibly in flight) or known, never both. `existing`
 * is a subset of `known`. Once a full sweep marks the cache complete, anything not existing is
 * treated as missing and lookups no longer wait.
 */
export interface ExistenceCache {
	lookup(id: string): ExistenceState;
	isExisting(id: string): boolean;
	/** Queues ids that are neither known nor pending; returns how many were added. */
	addPending(ids: Iterable<string>): number;
	/** Removes up to `size` queued ids in FIFO order. They stay pending until resolved. */
	takeBatch(size: number): Array<string>;
	queuedCount(): number;
	/** Marks ids known, records which of them exist and wakes their waiters. */
	resolve(ids: Iterable<string>, existing: ReadonlySet<string>): void;
	/** Resolves when the id is resolved or the timeout passes, whichever comes first. */
	waitFor(id: string, timeoutMs: number): Promise<void>;
	markComplete(): void;
	resetComplete(): void;
	isComplete(): boolean;
	counts(): { checked: number; total: number };
}

export function createExistenceCache(): ExistenceCache {
	const known = new Set<string>();
	const existing = new Set<string>();
	const pending = new Set<string>();
	let queue: Array<string> = [];
	const waiters = new Map<string, Array<() => void>>();
	let complete = false;

	return {
		lookup,
		isExisting: id => existing.has(id),
		addPending,
		takeBatch,
		queuedCount: () => queue.length,
		resolve,
		waitFor,
		markComplete: () => {
			complete = true;
		},
		resetComplete: () => {
			complete = false;
		},
		isComplete: () => complete,
		counts: () => ({ checked: known.size, total: known.size + pending.size }),
	};

	function lookup(id: string): ExistenceState {
		if (existing.has(id)) {
			return "exists";
		}
		if (complete || known.has(id)) {
			return "missing";
		}
		return "unknown";
	}

	function addPending(ids: Iterable<string>): number {
		let added = 0;
		for (const id of ids) {
			if (known.has(id) || pending.has(id)) {
				continue;
			}
			pending.add(id);
			queue.push(id);
			added++;
		}
		return added;
	}

	function takeBatch(size: number): Array<string> {
		const batch: Array<string> = [];
		let consumed = 0;
		while (consumed < queue.length && batch.length < size) {
			const id = queue[consumed];
			consumed++;
			// ids resolved by a sweep while still queued are dropped here
			if (pending.has(id)) {
				batch.push(id);
			}
		}
		queue = queue.slice(consumed);
		return batch;
	}

	function resolve(ids: Iterable<string>, existingIds: ReadonlySet<string>): void {
		for (const id of ids) {
			known.add(id);
			pending.delete(id);
			if (existingIds.has(id)) {
				existing.add(id);
			}
			const wake = waiters.get(id);
			if (wake) {
				waiters.delete(id);
				for (const fn of wake) {
					fn();
				}
			}
		}
	}

	function waitFor(id: string, timeoutMs: number): Promise<void> {
		if (complete || known.has(id)) {
			return Promise.resolve();
		}
		return new Promise(done => {
			const timer = setTimeout(finish, timeoutMs);
			function finish(): void {
				clearTimeout(timer);
				const list = waiters.get(id);
				if (list) {
					const remaining = list.filter(fn => fn !== finish);
					if (remaining.length > 0) {
						waiters.set(id, remaining);
					} else {
						waiters.delete(id);
					}
				}
				done();
			}
			const list = waiters.get(id) ?? [];
			list.push(finish);
			waiters.set(id, list);
		});
	}
}
