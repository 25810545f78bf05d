/**
 * Bounded concurrency gate. Tasks beyond the limit wait in FIFO order.
 */
export interface Limiter {
	/** Runs the task once a slot is free; the slot is released when it settles. */
	run<T>(task: () => Promise<T>): Promise<T>;
	/** Resolves once a slot is held; the caller must invoke the returned release exactly once. */
	acquire(): Promise<() => void>;
	/** Tasks currently holding a slot. */
	active(): number;
	/** Tasks waiting for a slot. */
	pending(): number;
	/** Highest number of slots held at the same time. */
	peak(): number;
}

export function createLimiter(concurrency: number): Limiter {
	if (!Number.isInteger(concurrency) || concurrency < 1) {
		throw new RangeError(`Limiter concurrency must be a positive integer, got ${concurrency}`);
	}

	const waiting: Array<() => void> = [];
	let running = 0;
	let highWater = 0;

	return { run, acquire, active: () => running, pending: () => waiting.length, peak: () => highWater };

	function acquire(): Promise<() => void> {
		return new Promise(resolve => {
			waiting.push(() => resolve(once(release)));
			dispatch();
		});
	}

	async function run<T>(task: () => Promise<T>): Promise<T> {
		const releaseSlot = await acquire();
		try {
			return await task();
		} finally {
			releaseSlot();
		}
	}

	function release(): void {
		running--;
		dispatch();
	}

	function dispatch(): void {
		while (waiting.length > 0 && running < concurrency) {
			const next = waiting.shift();
			if (!next) {
				break;
			}
			running++;
			highWater = Math.max(highWater, running);
			next();
		}
	}
}

function once(fn: () => void): () => void {
	let called = false;
	return () => {
		if (!called) {
			called = true;
			fn();
		}
	};
}
