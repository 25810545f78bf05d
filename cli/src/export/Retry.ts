/**
 * Retry policy and error taxonomy for materializing media from an asset source.
 *
 * Delays grow exponentially from a base and are capped; jitter adds up to a quarter of the capped
 * delay so that parallel retries spread out.
 */

export type ExportErrorKind = "remoteFetchFailed" | "timeout" | "unavailable" | "cancelled" | "failed";

const RETRYABLE_KINDS: ReadonlySet<ExportErrorKind> = new Set(["remoteFetchFailed", "timeout"]);

const NETWORK_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "EAI_AGAIN", "ECONNREFUSED", "EPIPE"]);
const UNAVAILABLE_CODES = new Set(["ENOENT", "EACCES", "EPERM"]);

/**
 * Classified failure of one export attempt.
 */
export class ExportError extends Error {
	readonly kind: ExportErrorKind;

	constructor(kind: ExportErrorKind, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "ExportError";
		this.kind = kind;
	}

	get retryable(): boolean {
		return RETRYABLE_KINDS.has(this.kind);
	}
}

/**
 * The caller asked the run to stop. Never retried and never counted as an error.
 */
export class StoppedByUserError extends Error {
	constructor() {
		super("Stopped by user");
		this.name = "StoppedByUserError";
	}
}

export interface RetryConfiguration {
	/** Retries after the first attempt */
	maxRetries: number;
	baseDelayMs: number;
	maxDelayMs: number;
	jitter: boolean;
}

export const DEFAULT_RETRY_CONFIGURATION: RetryConfiguration = {
	maxRetries: 3,
	baseDelayMs: 1000,
	maxDelayMs: 30_000,
	jitter: true,
};

function errorCode(err: Error): string | undefined {
	if ("code" in err && typeof err.code === "string") {
		return err.code;
	}
	if (err.cause instanceof Error) {
		return errorCode(err.cause);
	}
	return;
}

/**
 * Maps any thrown value onto the taxonomy. Already classified errors pass through.
 */
export function classifyError(err: unknown): ExportError | StoppedByUserError {
	if (err instanceof ExportError || err instanceof StoppedByUserError) {
		return err;
	}
	if (!(err instanceof Error)) {
		return new ExportError("failed", String(err));
	}
	if (err.name === "AbortError") {
		return new ExportError("cancelled", err.message, { cause: err });
	}
	if (err.name === "TimeoutError") {
		return new ExportError("timeout", err.message, { cause: err });
	}
	const code = errorCode(err);
	if (code && NETWORK_CODES.has(code)) {
		return new ExportError("remoteFetchFailed", err.message, { cause: err });
	}
	if (code && UNAVAILABLE_CODES.has(code)) {
		return new ExportError("unavailable", err.message, { cause: err });
	}
	if (/network|connection|socket/i.test(err.message)) {
		return new ExportError("remoteFetchFailed", err.message, { cause: err });
	}
	return new ExportError("failed", err.message, { cause: err });
}

/**
 * Backoff delay before retrying after the given 0-based attempt, without jitter.
 */
export function calculateBackoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
	return Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
}

/**
 * Jitter between 0 and 25% of the delay.
 */
export function addJitter(delayMs: number, random: () => number = Math.random): number {
	return Math.floor(delayMs * 0.25 * random());
}

export function retryDelay(
	attempt: number,
	config: RetryConfiguration,
	random: () => number = Math.random,
): number {
	const capped = calculateBackoffDelay(attempt, config.baseDelayMs, config.maxDelayMs);
	return config.jitter ? capped + addJitter(capped, random) : capped;
}
