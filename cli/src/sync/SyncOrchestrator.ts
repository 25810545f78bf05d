/**
 * Sync Orchestrator - the per-item loop that exports library items to a folder and/or the remote store.
 *
 * Each item is visited once per run. Its variants are skipped when the manifest shows an unchanged
 * copy at the expected path, otherwise materialized through the export controller, placed with the
 * collision policy and handed to the upload pipeline. Run control is polled between items: a pause
 * stops before the next item and leaves a resumable session, a cancel stops at once.
 */

import {
	createExportController,
	type ExportController,
	type ExportControllerOptions,
} from "../export/ExportController";
import { ExportError, StoppedByUserError } from "../export/Retry";
import { type Manifest, manifestPath, openManifest as openManifestDatabase } from "../manifest/ManifestDatabase";
import { createRemoteClient, type RemoteClientOptions, type RemoteStoreClient } from "../remote/RemoteClient";
import type { UploadMetadata } from "../remote/types";
import { errorMessage, getLog } from "../shared/logger";
import { createFailedUploadArchive } from "../upload/FailedUploadArchive";
import { createUploadPipeline, type ExistBatch, type UploadPipeline } from "../upload/UploadPipeline";
import { type AlbumCollector, createAlbumCollector, syncAlbums } from "./AlbumSync";
import { deleteOrphans } from "./Mirror";
import { baseFileName, dateFolder, extensionOf } from "./Naming";
import { pathExists, placeTempFile } from "./Placement";
import type { RunControl } from "./RunControl";
import { buildSession, createSessionStore, isResumable, reorderForResume, type RunSession } from "./Session";
import type {
	AlbumRef,
	AssetSource,
	CandidateItem,
	ExportMode,
	ExportVariantType,
	ProgressListener,
	RunResult,
	SyncOptions,
	Variant,
} from "./Types";
import { randomUUID } from "node:crypto";
import { mkdir, rm, stat } from "node:fs/promises";
import { join, posix } from "node:path";

const log = getLog(import.meta);

export const METADATA_SOURCE = "photosync";

/**
 * The run could not start: nothing to write to, an unusable directory or an incompatible session.
 */
export class SyncSetupError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "SyncSetupError";
	}
}

export interface SyncOrchestratorDeps {
	source: AssetSource;
	createClient?: (options: RemoteClientOptions) => RemoteStoreClient;
	openManifest?: (destination: string) => Promise<Manifest>;
	idGenerator?: () => string;
	now?: () => Date;
	/** Export controller timing overrides */
	exportTiming?: Pick<ExportControllerOptions, "tickMs" | "abortGraceMs" | "sleep" | "random">;
}

export interface SyncOrchestrator {
	run(
		options: SyncOptions,
		onProgress: ProgressListener,
		runControl: RunControl,
		resumeSession?: RunSession,
	): Promise<RunResult>;
}

/** One exportable facet of an item and how it is named locally and remotely. */
export interface VariantStep {
	type: ExportVariantType;
	/** Undefined for the rendered edit */
	variant?: Variant;
	fileSuffix: string;
	deviceSuffix: string;
	extension: string;
	resourceName: string;
	/** The paired video is awaited so its remote id can link the still */
	awaitResult: boolean;
}

function wantsOriginals(mode: ExportMode): boolean {
	return mode === "originals" || mode === "both";
}

function wantsEdited(mode: ExportMode): boolean {
	return mode === "edited" || mode === "both";
}

/**
 * Variants to export for an item, in processing order.
 */
export function planVariants(item: CandidateItem, mode: ExportMode, includeAdjustmentData: boolean): Array<VariantStep> {
	const find = (type: Variant["type"]) => item.variants.find(variant => variant.type === type);
	const steps: Array<VariantStep> = [];
	const original = find("original");

	if (wantsOriginals(mode)) {
		const paired = find("pairedVideo");
		const video = find("video");
		const adjustments = includeAdjustmentData ? find("adjustments") : undefined;
		const step = (
			type: VariantStep["type"],
			variant: Variant,
			fileSuffix: string,
			deviceSuffix: string,
			fallbackExt: string,
		): VariantStep => ({
			type,
			variant,
			fileSuffix,
			deviceSuffix,
			extension: extensionOf(variant.filename, fallbackExt),
			resourceName: variant.filename,
			awaitResult: type === "pairedVideo",
		});

		if (paired) {
			steps.push(step("pairedVideo", paired, "_live", ":pairedVideo", ".mov"));
		}
		if (original) {
			steps.push(step("original", original, "", "", ".bin"));
		}
		if (adjustments) {
			steps.push(step("adjustments", adjustments, "_adjustments", ":adjustments", ".aae"));
		}
		if (!paired && video) {
			steps.push(step("video", video, item.isLivePhoto ? "_live" : "", ":video", ".mov"));
		}
	}

	if (wantsEdited(mode) && item.kind === "image") {
		steps.push({
			type: "edited",
			fileSuffix: "_edited",
			deviceSuffix: ":edited",
			extension: original ? extensionOf(original.filename, ".jpg") : ".jpg",
			resourceName: "rendered",
			awaitResult: false,
		});
	}
	return steps;
}

/**
 * Device asset ids the up-front existence sweep checks for an item. Live photos are checked under both
 * video ids since either may have been used for the motion part.
 */
export function sweepIds(item: CandidateItem, mode: ExportMode): Array<string> {
	const ids: Array<string> = [];
	if (wantsOriginals(mode)) {
		if (item.kind === "image") {
			ids.push(item.id);
			if (item.isLivePhoto) {
				ids.push(`${item.id}:pairedVideo`, `${item.id}:video`);
			}
		} else {
			ids.push(`${item.id}:video`);
		}
	}
	if (wantsEdited(mode) && item.kind === "image") {
		ids.push(`${item.id}:edited`);
	}
	return ids;
}

/**
 * Groups sweep ids into batches of at most `batchSize` ids without splitting an item.
 */
export function buildExistBatches(
	items: ReadonlyArray<CandidateItem>,
	mode: ExportMode,
	batchSize: number,
): Array<ExistBatch> {
	const batches: Array<ExistBatch> = [];
	let current: ExistBatch = { ids: [], units: 0 };
	for (const item of items) {
		const ids = sweepIds(item, mode);
		if (current.ids.length > 0 && current.ids.length + ids.length > batchSize) {
			batches.push(current);
			current = { ids: [], units: 0 };
		}
		if (ids.length > 0) {
			current.ids.push(...ids);
			current.units++;
		}
	}
	if (current.ids.length > 0) {
		batches.push(current);
	}
	return batches;
}

export function manifestKey(itemId: string, variant: ExportVariantType): string {
	return `photo:${itemId}:${variant}`;
}

function epochSeconds(date: Date | undefined): number {
	return date ? date.getTime() / 1000 : 0;
}

export function variantSignature(item: CandidateItem, step: VariantStep): string {
	return `v:${step.type};mod:${epochSeconds(item.modifiedAt)};created:${epochSeconds(item.createdAt)};name:${step.resourceName}`;
}

/**
 * Candidates in processing order: album scope, capture-time sort (missing dates first), then limit.
 */
export function selectCandidates(items: ReadonlyArray<CandidateItem>, options: SyncOptions): Array<CandidateItem> {
	const scope = options.albumScope;
	const wanted = scope === "all" ? undefined : new Set(scope.albumIds);
	const inScope = wanted ? items.filter(item => item.albums.some(album => wanted.has(album.id))) : [...items];
	const time = (item: CandidateItem) => item.createdAt?.getTime() ?? Number.NEGATIVE_INFINITY;
	const direction = options.sortOrder === "oldest" ? 1 : -1;
	inScope.sort((a, b) => {
		const ta = time(a);
		const tb = time(b);
		return ta === tb ? 0 : ta < tb ? -direction : direction;
	});
	return options.limit !== undefined ? inScope.slice(0, options.limit) : inScope;
}

type ItemOutcome = "skipped" | "completed" | "error" | "stopped";

export function createSyncOrchestrator(deps: SyncOrchestratorDeps): SyncOrchestrator {
	const createClient = deps.createClient ?? createRemoteClient;
	const openManifest = deps.openManifest ?? openManifestDatabase;
	const idGenerator = deps.idGenerator ?? randomUUID;
	const now = deps.now ?? (() => new Date());

	return { run };

	async function ensureDir(dir: string, what: string): Promise<void> {
		try {
			await mkdir(dir, { recursive: true });
		} catch (err) {
			throw new SyncSetupError(`Cannot create ${what} ${dir}: ${errorMessage(err)}`, { cause: err });
		}
	}

	async function run(
		options: SyncOptions,
		onProgress: ProgressListener,
		runControl: RunControl,
		resumeSession?: RunSession,
	): Promise<RunResult> {
		const destination = options.folderDestination;
		const upload = options.upload;
		if (!destination && !upload) {
			throw new SyncSetupError("Nothing to sync to: set a folder destination, an upload target, or both");
		}
		if (resumeSession && !isResumable(resumeSession, options)) {
			throw new SyncSetupError("The saved session was paused under a different configuration");
		}
		await ensureDir(options.tempDir, "temp directory");
		if (destination && !options.dryRun) {
			await ensureDir(destination, "destination");
		}

		const runId = idGenerator();
		const startedAt = resumeSession?.startedAt ?? now();
		const sessionId = resumeSession?.sessionId ?? runId;
		const message = (text: string) => onProgress({ type: "message", text });
		const isCancelled = () => runControl.state() === "cancelled";

		log.info("run %s starting (mode %s, backup %s)", runId, options.mode, options.backupMode);

		// a dry run reads an existing manifest but never creates one
		const useManifest =
			destination !== undefined &&
			options.backupMode !== "full" &&
			(!options.dryRun || (await pathExists(manifestPath(destination))));
		const manifest = destination !== undefined && useManifest ? await openManifest(destination) : undefined;
		try {
			onProgress({ type: "scanning" });
			const listed = await deps.source.listItems({ media: options.media, since: options.since });
			let items = selectCandidates(listed, options);

			const processedIds = new Set(resumeSession?.processedAssetIds ?? []);
			const errorIds = new Set(resumeSession?.errorAssetIds ?? []);
			if (resumeSession) {
				if (manifest) {
					await touchProcessed(manifest, items, processedIds, options, runId);
				}
				const order = reorderForResume(items, resumeSession);
				items = order.items;
				message(order.message);
			}

			onProgress({ type: "willExport", total: items.length });

			let client: RemoteStoreClient | undefined;
			let pipeline: UploadPipeline | undefined;
			if (upload && !options.dryRun) {
				client = createClient({
					serverUrl: upload.serverUrl,
					apiKey: upload.apiKey,
					requestTimeoutMs: options.requestTimeoutMs,
				});
				pipeline = createUploadPipeline(upload.pipeline, {
					client,
					onEvent: onProgress,
					shouldCancel: isCancelled,
					archive: createFailedUploadArchive(options.stateDir, sessionId),
				});
				await prepareRemote(client, pipeline, items, options, message);
			}

			const collector = upload?.pipeline.syncAlbums && pipeline ? createAlbumCollector() : undefined;
			const controller = createExportController({
				retry: options.retry,
				requestTimeoutMs: options.requestTimeoutMs,
				downloadTimeoutMultiplier: options.downloadTimeoutMultiplier,
				tempDir: options.tempDir,
				shouldStop: isCancelled,
				onEvent: onProgress,
				dryRun: options.dryRun,
				...deps.exportTiming,
			});

			const tally = { attempted: 0, completed: 0, skipped: 0, errors: 0 };
			let wasPaused = false;
			let pauseIndex: number | undefined;

			for (let i = 0; i < items.length; i++) {
				const item = items[i];
				const state = runControl.state();
				if (state === "cancelled") {
					break;
				}
				if (state === "paused") {
					wasPaused = true;
					pauseIndex = i;
					onProgress({ type: "paused", at: i, total: items.length });
					break;
				}

				tally.attempted++;
				const outcome = await exportItem({
					item,
					index: i,
					total: items.length,
					options,
					runId,
					manifest,
					pipeline,
					controller,
					collector,
					onProgress,
					tally,
				});
				if (outcome === "stopped") {
					break;
				}
				processedIds.add(item.id);
				if (outcome === "skipped") {
					tally.skipped++;
				} else {
					tally.completed++;
					if (outcome === "error") {
						errorIds.add(item.id);
					}
				}
			}

			if (!isCancelled()) {
				await pipeline?.finishAndWait();
			}

			if (collector && client && !isCancelled()) {
				await syncAlbums({ client, entries: collector.snapshot(), shouldCancel: isCancelled, onMessage: message });
			}

			let mirrorDeleted = 0;
			if (options.backupMode === "mirror" && !wasPaused && !options.dryRun && manifest && destination) {
				mirrorDeleted = await deleteOrphans({
					manifest,
					destination,
					runId,
					prefix: "photo:",
					shouldCancel: isCancelled,
					onMessage: message,
				});
			}

			const uploadStats = pipeline?.stats();
			const result: RunResult = {
				runId,
				attempted: tally.attempted,
				completed: tally.completed,
				skipped: tally.skipped,
				errorCount: tally.errors + (uploadStats?.failed ?? 0),
				wasPaused,
				pauseIndex,
				processedIds: [...processedIds],
				errorIds: [...errorIds],
				mirrorDeleted,
			};

			if (!options.dryRun) {
				const sessions = createSessionStore(options.stateDir);
				if (wasPaused) {
					await sessions.save(
						buildSession({
							sessionId,
							startedAt,
							options,
							result,
							total: items.length,
							uploaded: uploadStats?.uploaded ?? 0,
							previous: resumeSession?.stats,
							now: now(),
						}),
					);
				} else {
					await sessions.clear();
				}
			}

			log.info(
				"run %s finished: %d attempted, %d completed, %d skipped, %d error(s)%s",
				runId,
				result.attempted,
				result.completed,
				result.skipped,
				result.errorCount,
				wasPaused ? " (paused)" : "",
			);
			return result;
		} finally {
			await manifest?.close();
		}
	}

	async function prepareRemote(
		client: RemoteStoreClient,
		pipeline: UploadPipeline,
		items: ReadonlyArray<CandidateItem>,
		options: SyncOptions,
		message: (text: string) => void,
	): Promise<void> {
		try {
			const stats = await client.getStatistics();
			message(`Remote: server has ${stats.total} assets (${stats.images} images, ${stats.videos} videos)`);
		} catch (err) {
			message(`ERROR Remote: could not fetch statistics: ${errorMessage(err)}`);
		}
		const batchSize = options.upload?.pipeline.existBatchSize ?? 1;
		try {
			await pipeline.syncExisting(buildExistBatches(items, options.mode, batchSize), items.length);
		} catch (err) {
			message(`ERROR Remote: exists sync failed: ${errorMessage(err)}`);
		}
	}

	// Items finished in an earlier session are not revisited; touching their entries keeps mirror mode
	// from treating them as orphans.
	async function touchProcessed(
		manifest: Manifest,
		items: ReadonlyArray<CandidateItem>,
		processedIds: ReadonlySet<string>,
		options: SyncOptions,
		runId: string,
	): Promise<void> {
		for (const item of items) {
			if (!processedIds.has(item.id)) {
				continue;
			}
			for (const step of planVariants(item, options.mode, options.includeAdjustmentData)) {
				await manifest.touch(manifestKey(item.id, step.type), runId);
			}
		}
	}

	interface ExportItemContext {
		item: CandidateItem;
		index: number;
		total: number;
		options: SyncOptions;
		runId: string;
		manifest: Manifest | undefined;
		pipeline: UploadPipeline | undefined;
		controller: ExportController;
		collector: AlbumCollector | undefined;
		onProgress: ProgressListener;
		tally: { errors: number };
	}

	async function exportItem(ctx: ExportItemContext): Promise<ItemOutcome> {
		const { item, options, manifest, pipeline } = ctx;
		const destination = options.folderDestination;
		const folder = dateFolder(item.createdAt);
		const base = baseFileName(item.createdAt, item.id);
		const outDir = destination ? join(destination, folder) : undefined;
		const message = (text: string) => ctx.onProgress({ type: "message", text });

		ctx.onProgress({
			type: "exporting",
			index: ctx.index + 1,
			total: ctx.total,
			itemId: item.id,
			baseName: base,
			kind: item.kind,
		});

		if (outDir && !options.dryRun) {
			await mkdir(outDir, { recursive: true });
		}

		const albums = albumsInScope(item.albums, options);
		const { collector } = ctx;
		const onAssetId =
			collector && albums.length > 0
				? (assetId: string | undefined) => {
						if (assetId) {
							collector.add(assetId, albums);
						}
					}
				: undefined;

		const steps = planVariants(item, options.mode, options.includeAdjustmentData);
		pipeline?.submitExistChecks(
			steps.filter(step => step.type !== "adjustments").map(step => `${item.id}${step.deviceSuffix}`),
		);

		let hadWork = false;
		let hadError = false;
		let allSkipped = true;
		let livePhotoVideoId: string | undefined;

		for (const step of steps) {
			hadWork = true;
			const filename = `${base}${step.fileSuffix}${step.extension}`;
			const relPath = posix.join(folder, filename);
			const desiredPath = outDir ? join(outDir, filename) : undefined;
			const key = manifestKey(item.id, step.type);
			const signature = variantSignature(item, step);

			if (manifest && desiredPath && (await isUnchanged(manifest, key, signature, relPath, desiredPath))) {
				if (!options.dryRun) {
					await manifest.touch(key, ctx.runId);
				}
				continue;
			}

			let tempPath: string | undefined;
			try {
				tempPath = await ctx.controller.materialize({
					itemId: item.id,
					baseName: base,
					extension: step.extension,
					fetch: (destPath, onProgress, signal) => {
						const { variant } = step;
						return variant
							? deps.source.exportVariant(item, variant, destPath, onProgress, signal)
							: deps.source.renderEdited(item, destPath, onProgress, signal);
					},
				});

				if (options.dryRun) {
					message(`Dry run: would export ${relPath}`);
					allSkipped = false;
					continue;
				}

				let uploadPath = tempPath;
				let deleteAfterUpload: string | undefined = tempPath;
				if (desiredPath) {
					const placed = await placeTempFile(tempPath, desiredPath);
					tempPath = undefined;
					uploadPath = placed.path;
					deleteAfterUpload = undefined;
					if (placed.type === "exported") {
						allSkipped = false;
					}
				}

				if (pipeline) {
					const createdAt = item.createdAt ?? now();
					const remoteId = await pipeline.enqueue({
						filePath: uploadPath,
						deleteAfterUpload,
						deviceAssetId: `${item.id}${step.deviceSuffix}`,
						filename,
						fileCreatedAt: createdAt,
						fileModifiedAt: item.modifiedAt ?? createdAt,
						durationSeconds: item.kind === "video" ? item.durationSeconds : undefined,
						isFavorite: item.isFavorite,
						livePhotoVideoId: step.type === "original" ? livePhotoVideoId : undefined,
						metadata: uploadMetadata(item, step),
						localIdentifier: item.id,
						awaitResult: step.awaitResult,
						onAssetId,
					});
					// the pipeline owns the temp file from here on
					tempPath = undefined;
					if (step.awaitResult) {
						livePhotoVideoId = remoteId;
					}
					allSkipped = false;
				}

				if (manifest && desiredPath) {
					await recordExport(manifest, key, signature, relPath, desiredPath, ctx.runId);
				}
			} catch (err) {
				if (err instanceof StoppedByUserError || (err instanceof ExportError && err.kind === "cancelled")) {
					message(`Stopped: ${item.id}`);
					return "stopped";
				}
				hadError = true;
				ctx.tally.errors++;
				message(`ERROR processing ${step.type}: ${errorMessage(err)}`);
			} finally {
				if (tempPath) {
					await rm(tempPath, { force: true });
				}
			}
		}

		if (!hadWork) {
			return "skipped";
		}
		if (hadError) {
			return "error";
		}
		return allSkipped ? "skipped" : "completed";
	}

	async function isUnchanged(
		manifest: Manifest,
		key: string,
		signature: string,
		relPath: string,
		desiredPath: string,
	): Promise<boolean> {
		const entry = await manifest.get(key);
		if (!entry || entry.deletedAt !== null || entry.signature !== signature || entry.relPath !== relPath) {
			return false;
		}
		return pathExists(desiredPath);
	}
}

async function recordExport(
	manifest: Manifest,
	key: string,
	signature: string,
	relPath: string,
	path: string,
	runId: string,
): Promise<void> {
	const stats = await stat(path);
	await manifest.upsert({
		key,
		relPath,
		signature,
		size: stats.size,
		mtime: Math.floor(stats.mtimeMs / 1000),
		lastSeenRunId: runId,
	});
}

function albumsInScope(albums: ReadonlyArray<AlbumRef>, options: SyncOptions): ReadonlyArray<AlbumRef> {
	const scope = options.albumScope;
	if (scope === "all") {
		return albums;
	}
	const wanted = new Set(scope.albumIds);
	return albums.filter(album => wanted.has(album.id));
}

function uploadMetadata(item: CandidateItem, step: VariantStep): UploadMetadata {
	return [
		{
			key: "mobile-app",
			value: {
				source: METADATA_SOURCE,
				assetLocalIdentifier: item.id,
				resourceType: step.variant ? step.variant.resourceType : "edited-render",
				originalFilename: step.variant ? step.variant.filename : step.resourceName,
			},
		},
	];
}
