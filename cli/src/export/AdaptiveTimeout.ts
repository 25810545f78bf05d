import { ExportError, StoppedByUserError } from "./Retry";

export const DEFAULT_TICK_MS = 1000;
export const DEFAULT_ABORT_GRACE_MS = 2000;

export interface AdaptiveTimeoutOptions {
	baseTimeoutMs: number;
	/** Applied to the base timeout once the operation reports partial progress */
	downloadMultiplier: number;
	tickMs?: number;
	/** Polled every tick; true aborts with StoppedByUserError */
	shouldStop?: () => boolean;
	/** How long an aborted operation may take to wind down before the rejection goes out anyway */
	abortGraceMs?: number;
}

/**
 * Runs one attempt under a timeout that is watched in fixed ticks.
 *
 * A progress report below 1.0 marks the attempt as downloading, which raises the effective timeout to
 * at least `baseTimeoutMs * downloadMultiplier`. Expiry or a stop aborts the signal handed to the
 * operation, then rejects once the operation has settled or `abortGraceMs` has passed, whichever
 * comes first, so callers cleaning up after a failure do not race a still-open write.
 */
export function withAdaptiveTimeout<T>(
	operation: (signal: AbortSignal, reportProgress: (progress: number) => void) => Promise<T>,
	options: AdaptiveTimeoutOptions,
): Promise<T> {
	const tickMs = options.tickMs ?? DEFAULT_TICK_MS;
	const abortGraceMs = options.abortGraceMs ?? DEFAULT_ABORT_GRACE_MS;
	const controller = new AbortController();
	let effectiveTimeoutMs = options.baseTimeoutMs;
	let elapsedMs = 0;
	let downloading = false;

	function reportProgress(progress: number): void {
		if (progress < 1 && !downloading) {
			downloading = true;
			effectiveTimeoutMs = Math.max(effectiveTimeoutMs, options.baseTimeoutMs * options.downloadMultiplier);
		}
	}

	return new Promise<T>((resolve, reject) => {
		let settled = false;

		function settle(): boolean {
			if (settled) {
				return false;
			}
			settled = true;
			clearInterval(ticker);
			return true;
		}

		function abortWith(reason: Error): void {
			controller.abort(reason);
			const timer = setTimeout(() => reject(reason), abortGraceMs);
			const done = () => {
				clearTimeout(timer);
				reject(reason);
			};
			attempt.then(done, done);
		}

		const ticker = setInterval(() => {
			elapsedMs += tickMs;
			if (options.shouldStop?.()) {
				if (settle()) {
					abortWith(new StoppedByUserError());
				}
				return;
			}
			if (elapsedMs >= effectiveTimeoutMs) {
				if (settle()) {
					const seconds = Math.round(effectiveTimeoutMs / 1000);
					abortWith(new ExportError("timeout", `Timed out after ${seconds}s`));
				}
			}
		}, tickMs);

		const attempt = (async () => operation(controller.signal, reportProgress))();
		attempt.then(
			value => {
				if (settle()) {
					resolve(value);
				}
			},
			(err: unknown) => {
				if (settle()) {
					reject(err);
				}
			},
		);
	});
}
