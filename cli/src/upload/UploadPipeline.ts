/**
 * Upload Pipeline - concurrent, batched, deduplicating uploads to the remote store.
 *
 * Three independent limiters bound hashing, uploading and the number of accepted-but-unfinished work
 * items. Existence checks (by device asset id) and checksum prechecks (by SHA-1) are batched: a batch
 * is sent when it reaches its size, after an idle delay, or at once when a caller waits for the result.
 * All mutable state lives in this closure; background batches are tracked the way `createQueue` tracks
 * its promises so `finishAndWait` can drain them.
 */

import { ExportError } from "../export/Retry";
import type { RemoteStoreClient, UploadAssetInput } from "../remote/RemoteClient";
import type { BulkUploadCheckResult, UploadMetadata } from "../remote/types";
import { createLimiter } from "../shared/Limiter";
import { errorMessage, getLog } from "../shared/logger";
import type { ProgressEventOf } from "../sync/Types";
import { sha1HexFile } from "./Checksum";
import { createExistenceCache } from "./ExistenceCache";
import type { FailedUploadArchive } from "./FailedUploadArchive";
import { rm } from "node:fs/promises";

const log = getLog(import.meta);

export const DEFAULT_FLUSH_DELAY_MS = 1000;
export const DEFAULT_EXIST_WAIT_MS = 250;
const MAX_SWEEP_CONCURRENCY = 6;

export interface UploadPipelineOptions {
	deviceId: string;
	uploadConcurrency: number;
	hashConcurrency: number;
	/** Default `max(8, uploadConcurrency * 4)` */
	maxInFlight?: number;
	checksumPrecheck: boolean;
	skipHash: boolean;
	bulkCheckBatchSize: number;
	existBatchSize: number;
	syncAlbums: boolean;
	/** Replace remote assets whose device asset id already exists */
	updateChangedAssets: boolean;
	flushDelayMs?: number;
	existWaitMs?: number;
}

export type PipelineEvent = ProgressEventOf<"message"> | ProgressEventOf<"existenceCheck">;

export interface UploadPipelineDeps {
	client: RemoteStoreClient;
	onEvent: (event: PipelineEvent) => void;
	shouldCancel: () => boolean;
	archive?: FailedUploadArchive;
	/** SHA-1 hex of a file; defaults to streaming the file through node:crypto */
	hashFile?: (path: string) => Promise<string>;
}

export interface UploadWork {
	filePath: string;
	/** Caller-owned temp file removed once the work settles */
	deleteAfterUpload?: string;
	deviceAssetId: string;
	filename: string;
	fileCreatedAt: Date;
	fileModifiedAt: Date;
	durationSeconds?: number;
	isFavorite?: boolean;
	livePhotoVideoId?: string;
	metadata: UploadMetadata;
	/** Source identifier kept in failure records */
	localIdentifier?: string;
	/** When set, `enqueue` resolves with the remote id (or rejects) instead of returning at once */
	awaitResult?: boolean;
	onAssetId?: (assetId: string | undefined) => void;
}

export interface ExistBatch {
	ids: Array<string>;
	/** Progress units the batch stands for (items, not ids) */
	units: number;
}

export interface UploadStats {
	uploaded: number;
	duplicates: number;
	skippedExisting: number;
	failed: number;
	replaced: number;
	peakHashConcurrency: number;
	peakUploadConcurrency: number;
}

export interface UploadPipeline {
	/** Queues ids for background existence checks. Ignored once a full sweep completed. */
	submitExistChecks(deviceAssetIds: Array<string>): void;
	/** Checks every batch up front, a few at a time, then marks the existence cache complete. */
	syncExisting(batches: Array<ExistBatch>, totalUnits: number): Promise<void>;
	/**
	 * Accepts one upload. Resolves once the work holds an in-flight slot, or, with `awaitResult`,
	 * once the remote id is known.
	 *
	 * @returns the remote asset id for awaited work, undefined otherwise
	 */
	enqueue(work: UploadWork): Promise<string | undefined>;
	/** Flushes pending batches and resolves when all accepted work has finished. */
	finishAndWait(): Promise<void>;
	isExisting(deviceAssetId: string): boolean;
	stats(): UploadStats;
}

type BulkDecision = { duplicate: true; assetId: string | undefined } | { duplicate: false };

type BulkEntry = {
	work: UploadWork;
	sha1: string;
	decide: (decision: BulkDecision) => void;
};

type Outcome = { ok: true; assetId: string | undefined } | { ok: false; error: unknown };

function isDuplicate(result: BulkUploadCheckResult | undefined): boolean {
	return result?.action === "reject" && result.reason === "duplicate";
}

export function createUploadPipeline(options: UploadPipelineOptions, deps: UploadPipelineDeps): UploadPipeline {
	const { client, onEvent } = deps;
	const hashFile = deps.hashFile ?? sha1HexFile;
	const flushDelayMs = options.flushDelayMs ?? DEFAULT_FLUSH_DELAY_MS;
	const existWaitMs = options.existWaitMs ?? DEFAULT_EXIST_WAIT_MS;
	const maxInFlight = options.maxInFlight ?? Math.max(8, options.uploadConcurrency * 4);

	const inFlightLimiter = createLimiter(maxInFlight);
	const hashLimiter = createLimiter(options.hashConcurrency);
	const uploadLimiter = createLimiter(options.uploadConcurrency);
	const cache = createExistenceCache();

	const work = new Set<Promise<Outcome>>();
	const background = new Set<Promise<void>>();

	let announcedBackgroundExist = false;
	let existInProgress = false;
	let existTimer: ReturnType<typeof setTimeout> | undefined;
	let lastReported: { checked: number; total: number } | undefined;

	let pendingBulk: Array<BulkEntry> = [];
	let bulkInProgress = false;
	let bulkForceRequested = false;
	let bulkTimer: ReturnType<typeof setTimeout> | undefined;
	let draining = false;

	const counters = { uploaded: 0, duplicates: 0, skippedExisting: 0, failed: 0, replaced: 0 };

	return {
		submitExistChecks,
		syncExisting,
		enqueue,
		finishAndWait,
		isExisting: id => cache.isExisting(id),
		stats: () => ({
			...counters,
			peakHashConcurrency: hashLimiter.peak(),
			peakUploadConcurrency: uploadLimiter.peak(),
		}),
	};

	function message(text: string): void {
		onEvent({ type: "message", text });
	}

	function track(promise: Promise<void>): void {
		const tracked = promise.finally(() => {
			background.delete(tracked);
		});
		background.add(tracked);
	}

	// -------------------------------------------------------------------------
	// Existence checks
	// -------------------------------------------------------------------------

	function submitExistChecks(deviceAssetIds: Array<string>): void {
		if (cache.isComplete() || deviceAssetIds.length === 0) {
			return;
		}
		if (!announcedBackgroundExist) {
			announcedBackgroundExist = true;
			message("Remote: checking existing assets (background)...");
		}
		cache.addPending(deviceAssetIds);
		reportExistProgress(false);
		scheduleExistFlush();
		maybeStartExistCheck(false);
	}

	async function syncExisting(batches: Array<ExistBatch>, totalUnits: number): Promise<void> {
		cache.resetComplete();
		announcedBackgroundExist = true;
		message("Remote: syncing existing assets...");
		onEvent({ type: "existenceCheck", checked: 0, total: totalUnits });

		const sweepLimiter = createLimiter(Math.max(1, Math.min(options.uploadConcurrency, MAX_SWEEP_CONCURRENCY)));
		let checked = 0;

		await Promise.all(
			batches.map(batch =>
				sweepLimiter.run(async () => {
					if (deps.shouldCancel()) {
						return;
					}
					try {
						const existing = await client.checkExisting(options.deviceId, batch.ids);
						cache.resolve(batch.ids, existing);
					} catch (err) {
						message(`ERROR Remote: exist sync batch failed (${batch.ids.length} ids): ${errorMessage(err)}`);
						cache.resolve(batch.ids, new Set());
					}
					checked += batch.units;
					onEvent({ type: "existenceCheck", checked: Math.min(checked, totalUnits), total: totalUnits });
				}),
			),
		);

		cache.markComplete();
		onEvent({ type: "existenceCheck", checked: totalUnits, total: totalUnits });
		message("Remote: exists sync complete");
	}

	function maybeStartExistCheck(force: boolean): void {
		if (existInProgress || cache.queuedCount() === 0) {
			return;
		}
		if (!force && !draining && cache.queuedCount() < options.existBatchSize) {
			return;
		}
		const batch = cache.takeBatch(options.existBatchSize);
		if (batch.length === 0) {
			return;
		}
		existInProgress = true;
		cancelExistTimer();
		log.debug("exist batch starting (%d ids)", batch.length);
		track(runExistBatch(batch));
	}

	async function runExistBatch(ids: Array<string>): Promise<void> {
		const started = Date.now();
		try {
			const existing = await client.checkExisting(options.deviceId, ids);
			cache.resolve(ids, existing);
			log.debug("exist batch complete (%d ids, %dms)", ids.length, Date.now() - started);
		} catch (err) {
			// Unknown ids fall through to upload; the checksum precheck or the server catches duplicates.
			message(`ERROR Remote: exist batch failed (${ids.length} ids, ${Date.now() - started}ms): ${errorMessage(err)}`);
			cache.resolve(ids, new Set());
		} finally {
			existInProgress = false;
			reportExistProgress(false);
			scheduleExistFlush();
			maybeStartExistCheck(false);
		}
	}

	function reportExistProgress(force: boolean): void {
		const { checked, total } = cache.counts();
		if (total === 0) {
			return;
		}
		if (!force && lastReported) {
			const checkedDelta = Math.abs(checked - lastReported.checked);
			const totalDelta = Math.abs(total - lastReported.total);
			if (checkedDelta < 200 && totalDelta < 500) {
				return;
			}
		}
		lastReported = { checked, total };
		onEvent({ type: "existenceCheck", checked, total });
	}

	function scheduleExistFlush(): void {
		if (existTimer || existInProgress || cache.queuedCount() === 0) {
			return;
		}
		if (cache.queuedCount() >= options.existBatchSize) {
			return;
		}
		existTimer = setTimeout(() => {
			existTimer = undefined;
			maybeStartExistCheck(true);
		}, flushDelayMs);
	}

	function cancelExistTimer(): void {
		if (existTimer) {
			clearTimeout(existTimer);
			existTimer = undefined;
		}
	}

	async function shouldSkipBecauseExists(deviceAssetId: string): Promise<boolean> {
		const state = cache.lookup(deviceAssetId);
		if (state !== "unknown") {
			return state === "exists";
		}
		if (cache.addPending([deviceAssetId]) > 0) {
			scheduleExistFlush();
			maybeStartExistCheck(false);
		}
		await cache.waitFor(deviceAssetId, existWaitMs);
		return cache.lookup(deviceAssetId) === "exists";
	}

	// -------------------------------------------------------------------------
	// Checksum precheck
	// -------------------------------------------------------------------------

	function awaitBulkDecision(item: UploadWork, sha1: string): Promise<BulkDecision> {
		return new Promise(decide => {
			pendingBulk.push({ work: item, sha1, decide });
			maybeStartBulkCheck(item.awaitResult ?? false);
			scheduleBulkFlush();
		});
	}

	function maybeStartBulkCheck(force: boolean): void {
		if (pendingBulk.length === 0) {
			return;
		}
		if (bulkInProgress) {
			bulkForceRequested ||= force;
			return;
		}
		if (!force && !draining && pendingBulk.length < options.bulkCheckBatchSize) {
			return;
		}
		bulkInProgress = true;
		bulkForceRequested = false;
		cancelBulkTimer();
		const batch = pendingBulk.slice(0, options.bulkCheckBatchSize);
		pendingBulk = pendingBulk.slice(batch.length);
		track(runBulkBatch(batch));
	}

	async function runBulkBatch(batch: Array<BulkEntry>): Promise<void> {
		try {
			const results = await client.bulkUploadCheck(
				batch.map(entry => ({ id: entry.work.deviceAssetId, checksum: entry.sha1 })),
			);
			const byId = new Map(results.map(result => [result.id, result]));
			for (const entry of batch) {
				const result = byId.get(entry.work.deviceAssetId);
				entry.decide(isDuplicate(result) ? { duplicate: true, assetId: result?.assetId } : { duplicate: false });
			}
		} catch (err) {
			// Items of a failed batch go on to a normal upload; the server still rejects true duplicates.
			message(`ERROR Remote: bulk check failed (${batch.length} items): ${errorMessage(err)}`);
			for (const entry of batch) {
				entry.decide({ duplicate: false });
			}
		} finally {
			bulkInProgress = false;
			scheduleBulkFlush();
			maybeStartBulkCheck(bulkForceRequested);
		}
	}

	function scheduleBulkFlush(): void {
		if (bulkTimer || bulkInProgress || pendingBulk.length === 0) {
			return;
		}
		if (pendingBulk.length >= options.bulkCheckBatchSize) {
			return;
		}
		bulkTimer = setTimeout(() => {
			bulkTimer = undefined;
			maybeStartBulkCheck(true);
		}, flushDelayMs);
	}

	function cancelBulkTimer(): void {
		if (bulkTimer) {
			clearTimeout(bulkTimer);
			bulkTimer = undefined;
		}
	}

	// -------------------------------------------------------------------------
	// Work items
	// -------------------------------------------------------------------------

	async function enqueue(item: UploadWork): Promise<string | undefined> {
		if (deps.shouldCancel()) {
			throw new ExportError("cancelled", `Cancelled before uploading ${item.filename}`);
		}

		const useFastExistSkip =
			!(options.syncAlbums || options.updateChangedAssets) && !options.checksumPrecheck;
		if (useFastExistSkip && (await shouldSkipBecauseExists(item.deviceAssetId))) {
			message(`Remote: exists, skipping upload (${item.deviceAssetId})`);
			counters.skippedExisting++;
			await removeTemp(item);
			return;
		}

		const release = await inFlightLimiter.acquire();
		const outcome = settle(item).finally(() => {
			release();
			work.delete(outcome);
		});
		work.add(outcome);

		if (!item.awaitResult) {
			return;
		}
		const result = await outcome;
		if (!result.ok) {
			throw result.error;
		}
		return result.assetId;
	}

	async function settle(item: UploadWork): Promise<Outcome> {
		try {
			const assetId = await processWork(item);
			item.onAssetId?.(assetId);
			return { ok: true, assetId };
		} catch (error) {
			counters.failed++;
			message(`ERROR upload failed (${item.deviceAssetId}): ${errorMessage(error)}`);
			await deps.archive?.record({
				deviceId: options.deviceId,
				deviceAssetId: item.deviceAssetId,
				localIdentifier: item.localIdentifier,
				filename: item.filename,
				fileCreatedAt: item.fileCreatedAt.toISOString(),
				fileModifiedAt: item.fileModifiedAt.toISOString(),
				durationSeconds: item.durationSeconds,
				isFavorite: item.isFavorite,
				livePhotoVideoId: item.livePhotoVideoId,
				metadata: item.metadata,
				errorDescription: errorMessage(error),
			});
			return { ok: false, error };
		}
	}

	async function processWork(item: UploadWork): Promise<string | undefined> {
		try {
			const sha1 = options.skipHash ? undefined : await hashLimiter.run(() => hashFile(item.filePath));

			if (options.checksumPrecheck && sha1) {
				const decision = await awaitBulkDecision(item, sha1);
				if (decision.duplicate) {
					message(`Remote: duplicate, skipping upload (${item.deviceAssetId})`);
					counters.duplicates++;
					return decision.assetId;
				}
			}

			if (options.updateChangedAssets && cache.isExisting(item.deviceAssetId)) {
				await replaceExisting(item);
			}

			return await upload(item, sha1);
		} finally {
			await removeTemp(item);
		}
	}

	// Delete-then-upload: a crash between the two leaves the asset missing until the next run uploads it.
	async function replaceExisting(item: UploadWork): Promise<void> {
		try {
			const existingId = await client.getAssetIdByDeviceId(options.deviceId, item.deviceAssetId);
			if (!existingId) {
				message(`ERROR Remote: could not resolve existing asset id (${item.deviceAssetId}); uploading may fail`);
				return;
			}
			message(`Remote: replacing existing asset (${item.deviceAssetId})`);
			await client.deleteAssets([existingId]);
			counters.replaced++;
		} catch (err) {
			message(`ERROR Remote: could not delete existing asset (${item.deviceAssetId}): ${errorMessage(err)}`);
		}
	}

	async function upload(item: UploadWork, sha1: string | undefined): Promise<string> {
		const input: UploadAssetInput = {
			filePath: item.filePath,
			checksum: sha1,
			deviceId: options.deviceId,
			deviceAssetId: item.deviceAssetId,
			filename: item.filename,
			fileCreatedAt: item.fileCreatedAt,
			fileModifiedAt: item.fileModifiedAt,
			durationSeconds: item.durationSeconds,
			isFavorite: item.isFavorite,
			livePhotoVideoId: item.livePhotoVideoId,
			metadata: item.metadata,
		};
		const result = await uploadLimiter.run(() => client.uploadAsset(input));
		message(`Remote: upload ${result.status} (${item.deviceAssetId})`);
		if (result.status === "duplicate") {
			counters.duplicates++;
		} else {
			counters.uploaded++;
		}
		return result.id;
	}

	async function removeTemp(item: UploadWork): Promise<void> {
		if (item.deleteAfterUpload) {
			await rm(item.deleteAfterUpload, { force: true });
		}
	}

	// -------------------------------------------------------------------------
	// Draining
	// -------------------------------------------------------------------------

	async function finishAndWait(): Promise<void> {
		draining = true;
		try {
			maybeStartBulkCheck(true);
			maybeStartExistCheck(true);
			reportExistProgress(true);
			while (work.size > 0 || background.size > 0) {
				await Promise.all([...work, ...background]);
				maybeStartBulkCheck(true);
				maybeStartExistCheck(true);
			}
		} finally {
			draining = false;
			cancelBulkTimer();
			cancelExistTimer();
		}
	}
}
