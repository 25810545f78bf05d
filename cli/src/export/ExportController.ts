import { errorMessage, getLog } from "../shared/logger";
import type { ProgressEventOf, ProgressReporter } from "../sync/Types";
import { withAdaptiveTimeout } from "./AdaptiveTimeout";
import { classifyError, type RetryConfiguration, retryDelay, StoppedByUserError } from "./Retry";
import { randomUUID } from "node:crypto";
import { rm } from "node:fs/promises";
import { join } from "node:path";

const log = getLog(import.meta);

export type ExportControllerEvent = ProgressEventOf<"retrying"> | ProgressEventOf<"downloading">;

export interface ExportControllerOptions {
	retry: RetryConfiguration;
	requestTimeoutMs: number;
	downloadTimeoutMultiplier: number;
	tempDir: string;
	shouldStop: () => boolean;
	onEvent: (event: ExportControllerEvent) => void;
	dryRun?: boolean;
	tickMs?: number;
	abortGraceMs?: number;
	sleep?: (ms: number) => Promise<void>;
	random?: () => number;
}

export interface MaterializeRequest {
	itemId: string;
	baseName: string;
	/** Extension including the dot, kept on the temp file so later stages can sniff the type */
	extension: string;
	fetch: (destPath: string, onProgress: ProgressReporter, signal: AbortSignal) => Promise<void>;
}

export interface ExportController {
	/**
	 * Fetches the bytes into a fresh temp file and returns its path. The caller owns the file.
	 *
	 * @throws ExportError once retries are exhausted or the failure is not retryable
	 * @throws StoppedByUserError when the run was stopped
	 */
	materialize(request: MaterializeRequest): Promise<string>;
}

function defaultSleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

export function createExportController(options: ExportControllerOptions): ExportController {
	const sleep = options.sleep ?? defaultSleep;
	const maxAttempts = options.retry.maxRetries + 1;

	return { materialize };

	async function materialize(request: MaterializeRequest): Promise<string> {
		if (options.dryRun) {
			return join(options.tempDir, `.dry-run-${randomUUID()}${request.extension}`);
		}

		for (let attempt = 0; ; attempt++) {
			if (options.shouldStop()) {
				throw new StoppedByUserError();
			}
			const tempPath = join(options.tempDir, `.tmp-${randomUUID()}${request.extension}`);
			try {
				await withAdaptiveTimeout(
					(signal, reportProgress) =>
						request.fetch(
							tempPath,
							progress => {
								reportProgress(progress);
								options.onEvent({
									type: "downloading",
									itemId: request.itemId,
									baseName: request.baseName,
									progress,
									attempt: attempt + 1,
								});
							},
							signal,
						),
					{
						baseTimeoutMs: options.requestTimeoutMs,
						downloadMultiplier: options.downloadTimeoutMultiplier,
						tickMs: options.tickMs,
						abortGraceMs: options.abortGraceMs,
						shouldStop: options.shouldStop,
					},
				);
				return tempPath;
			} catch (err) {
				await rm(tempPath, { force: true });
				const failure = classifyError(err);
				if (failure instanceof StoppedByUserError) {
					throw failure;
				}
				if (!failure.retryable || attempt + 1 >= maxAttempts) {
					throw failure;
				}

				const delayMs = retryDelay(attempt, options.retry, options.random);
				const reason = errorMessage(failure);
				log.warn(
					"Retrying %s (attempt %d/%d, retry in %dms): %s",
					request.baseName,
					attempt + 1,
					maxAttempts,
					delayMs,
					reason,
				);
				options.onEvent({
					type: "retrying",
					itemId: request.itemId,
					baseName: request.baseName,
					attempt: attempt + 1,
					maxAttempts,
					delayMs,
					reason,
				});
				await sleep(delayMs);
			}
		}
	}
}
