/**
 * Folder backup - copies plain directory trees to a destination folder and/or uploads them to the
 * remote store, with the same manifest skip and mirror rules as library runs.
 */

import { type Manifest, manifestPath, openManifest as openManifestDatabase } from "../manifest/ManifestDatabase";
import { createRemoteClient, type RemoteClientOptions, type RemoteStoreClient } from "../remote/RemoteClient";
import { errorMessage, getLog } from "../shared/logger";
import { deleteOrphans } from "./Mirror";
import { pathExists, placeTempFile } from "./Placement";
import type { RunControl } from "./RunControl";
import { SyncSetupError } from "./SyncOrchestrator";
import type { BackupMode, ProgressListener } from "./Types";
import { randomUUID } from "node:crypto";
import { copyFile, mkdir, readdir, rm, stat } from "node:fs/promises";
import { basename, dirname, join, posix, resolve } from "node:path";

const log = getLog(import.meta);

export const FOLDER_TEMP_DIR = ".photosync-tmp";
const FILE_KEY_PREFIX = "file:";

type SinkOutcome = "skipped" | "done" | "error";

export interface FolderUploadTarget {
	serverUrl: string;
	apiKey: string;
	deviceId: string;
	existBatchSize: number;
	/** Delete and re-upload files the server already has under the same device asset id */
	updateChanged: boolean;
}

export interface FolderBackupOptions {
	/** Directory roots; relative paths inside each root name the outputs */
	sources: Array<string>;
	destination?: string;
	backupMode: BackupMode;
	includeHiddenFiles: boolean;
	followSymlinks: boolean;
	dryRun: boolean;
	upload?: FolderUploadTarget;
	requestTimeoutMs?: number;
}

export interface FolderBackupResult {
	scanned: number;
	copied: number;
	/** Files no sink had to act on */
	skipped: number;
	deleted: number;
	uploaded: number;
	replaced: number;
	errorCount: number;
}

export interface FolderBackupDeps {
	createClient?: (options: RemoteClientOptions) => RemoteStoreClient;
	openManifest?: (destination: string) => Promise<Manifest>;
	idGenerator?: () => string;
}

export interface ScannedFile {
	path: string;
	/** POSIX path relative to its source root */
	relPath: string;
	size: number;
	createdAt: Date;
	modifiedAt: Date;
}

export function fileKey(relPath: string): string {
	return `${FILE_KEY_PREFIX}${relPath}`;
}

export function fileSignature(file: Pick<ScannedFile, "size" | "modifiedAt">): string {
	return `size:${file.size};mtime:${file.modifiedAt.getTime() / 1000}`;
}

function isHidden(name: string): boolean {
	return name.startsWith(".");
}

/**
 * Regular files under each root in sorted order. Hidden entries and symlinks are left out unless asked for.
 */
export async function scanFolders(
	roots: ReadonlyArray<string>,
	options: Pick<FolderBackupOptions, "includeHiddenFiles" | "followSymlinks">,
	shouldStop: () => boolean = () => false,
): Promise<Array<ScannedFile>> {
	const files: Array<ScannedFile> = [];

	async function walk(dir: string, rel: string): Promise<void> {
		const entries = await readdir(dir, { withFileTypes: true });
		entries.sort((a, b) => a.name.localeCompare(b.name));
		for (const entry of entries) {
			if (shouldStop()) {
				return;
			}
			if (!options.includeHiddenFiles && isHidden(entry.name)) {
				continue;
			}
			if (entry.isSymbolicLink() && !options.followSymlinks) {
				continue;
			}
			const path = join(dir, entry.name);
			const relPath = rel ? posix.join(rel, entry.name) : entry.name;
			const stats = await stat(path).catch((err: unknown) => {
				log.warn("skipping %s: %s", path, errorMessage(err));
				return undefined;
			});
			if (!stats) {
				continue;
			}
			if (stats.isDirectory()) {
				await walk(path, relPath);
			} else if (stats.isFile()) {
				const modifiedAt = stats.mtime;
				const createdAt = stats.birthtimeMs > 0 ? stats.birthtime : modifiedAt;
				files.push({ path, relPath, size: stats.size, createdAt, modifiedAt });
			}
		}
	}

	for (const root of roots) {
		if (shouldStop()) {
			break;
		}
		await walk(resolve(root), "");
	}
	return files;
}

export async function runFolderBackup(
	options: FolderBackupOptions,
	onProgress: ProgressListener,
	runControl: RunControl,
	deps: FolderBackupDeps = {},
): Promise<FolderBackupResult> {
	const createClient = deps.createClient ?? createRemoteClient;
	const openManifest = deps.openManifest ?? openManifestDatabase;
	const runId = (deps.idGenerator ?? randomUUID)();
	const message = (text: string) => onProgress({ type: "message", text });
	const isCancelled = () => runControl.state() === "cancelled";
	const isStopping = () => runControl.state() !== "running";
	const { destination, upload } = options;

	if (!destination && !upload) {
		throw new SyncSetupError("Nothing to back up to: set a destination folder, an upload target, or both");
	}

	const result: FolderBackupResult = {
		scanned: 0,
		copied: 0,
		skipped: 0,
		deleted: 0,
		uploaded: 0,
		replaced: 0,
		errorCount: 0,
	};

	const useManifest =
		destination !== undefined &&
		options.backupMode !== "full" &&
		(!options.dryRun || (await pathExists(manifestPath(destination))));
	const manifest = destination !== undefined && useManifest ? await openManifest(destination) : undefined;
	let existing: ReadonlySet<string> = new Set();

	try {
		onProgress({ type: "fileScanning" });
		const files = await scanFolders(options.sources, options, isStopping);
		if (runControl.state() === "paused") {
			message("Files: pause requested; stopping after scan");
		}
		onProgress({ type: "fileWillCopy", total: files.length });
		log.info("folder backup %s: %d file(s) from %d root(s)", runId, files.length, options.sources.length);

		const client = upload
			? createClient({ serverUrl: upload.serverUrl, apiKey: upload.apiKey, requestTimeoutMs: options.requestTimeoutMs })
			: undefined;
		if (client && upload) {
			existing = await existingFileIds(client, upload, files);
		}

		let paused = false;
		for (let i = 0; i < files.length; i++) {
			const file = files[i];
			const state = runControl.state();
			if (state !== "running") {
				paused = state === "paused";
				break;
			}
			result.scanned++;
			onProgress({ type: "fileCopying", index: i + 1, total: files.length, relPath: file.relPath });

			let acted = false;
			if (destination) {
				if ((await copyToDestination(file, destination)) !== "skipped") {
					acted = true;
				}
			}
			if (client && upload) {
				if ((await uploadFile(client, upload, file)) !== "skipped") {
					acted = true;
				}
			}
			if (!acted) {
				result.skipped++;
			}
		}

		if (options.backupMode === "mirror" && !paused && !options.dryRun && manifest && destination) {
			result.deleted = await deleteOrphans({
				manifest,
				destination,
				runId,
				prefix: FILE_KEY_PREFIX,
				shouldCancel: isCancelled,
				onMessage: message,
			});
		}
		if (destination && !options.dryRun) {
			await rm(join(destination, FOLDER_TEMP_DIR), { recursive: true, force: true });
		}
	} finally {
		await manifest?.close();
	}

	log.info(
		"folder backup %s finished: %d copied, %d uploaded, %d skipped, %d error(s)",
		runId,
		result.copied,
		result.uploaded,
		result.skipped,
		result.errorCount,
	);
	return result;

	async function copyToDestination(file: ScannedFile, destination: string): Promise<SinkOutcome> {
		const key = fileKey(file.relPath);
		const signature = fileSignature(file);
		const desired = join(destination, file.relPath);

		if (manifest) {
			const entry = await manifest.get(key);
			if (
				entry &&
				entry.deletedAt === null &&
				entry.signature === signature &&
				(await pathExists(join(destination, entry.relPath)))
			) {
				if (!options.dryRun) {
					await manifest.touch(key, runId);
				}
				return "skipped";
			}
		}

		if (options.dryRun) {
			result.copied++;
			return "done";
		}

		const tmp = join(destination, FOLDER_TEMP_DIR, `.tmp-${randomUUID()}`);
		try {
			await mkdir(dirname(desired), { recursive: true });
			await mkdir(dirname(tmp), { recursive: true });
			await copyFile(file.path, tmp);
			const placed = await placeTempFile(tmp, desired);
			if (placed.type === "exported") {
				result.copied++;
			}
			await manifest?.upsert({
				key,
				relPath: file.relPath,
				signature,
				size: file.size,
				mtime: Math.floor(file.modifiedAt.getTime() / 1000),
				lastSeenRunId: runId,
			});
			return placed.type === "exported" ? "done" : "skipped";
		} catch (err) {
			result.errorCount++;
			message(`ERROR Files: copy failed for ${file.relPath}: ${errorMessage(err)}`);
			await rm(tmp, { force: true });
			return "error";
		}
	}

	async function uploadFile(client: RemoteStoreClient, target: FolderUploadTarget, file: ScannedFile): Promise<SinkOutcome> {
		const deviceAssetId = fileKey(file.relPath);
		try {
			if (existing.has(deviceAssetId)) {
				if (!target.updateChanged) {
					return "skipped";
				}
				const remoteId = await client.getAssetIdByDeviceId(target.deviceId, deviceAssetId);
				if (!remoteId) {
					return "skipped";
				}
				if (!options.dryRun) {
					await client.deleteAssets([remoteId]);
				}
				result.replaced++;
			}

			if (options.dryRun) {
				result.uploaded++;
				return "done";
			}

			const filename = basename(file.path);
			await client.uploadAsset({
				filePath: file.path,
				deviceId: target.deviceId,
				deviceAssetId,
				filename,
				fileCreatedAt: file.createdAt,
				fileModifiedAt: file.modifiedAt,
				metadata: [
					{
						filename,
						type: "file",
						filePath: file.relPath,
						createdAt: file.createdAt.toISOString(),
						modifiedAt: file.modifiedAt.toISOString(),
					},
				],
			});
			result.uploaded++;
			return "done";
		} catch (err) {
			result.errorCount++;
			message(`ERROR Remote: upload failed for file ${file.relPath}: ${errorMessage(err)}`);
			return "error";
		}
	}

	async function existingFileIds(
		client: RemoteStoreClient,
		target: FolderUploadTarget,
		files: ReadonlyArray<ScannedFile>,
	): Promise<Set<string>> {
		const ids = files.map(file => fileKey(file.relPath));
		const found = new Set<string>();
		const batchSize = Math.max(1, target.existBatchSize);
		for (let checked = 0; checked < ids.length; ) {
			if (isCancelled()) {
				break;
			}
			const batch = ids.slice(checked, checked + batchSize);
			try {
				for (const id of await client.checkExisting(target.deviceId, batch)) {
					found.add(id);
				}
			} catch (err) {
				message(`ERROR Remote: exist check failed for file sync: ${errorMessage(err)}`);
			}
			checked += batch.length;
			onProgress({ type: "existenceCheck", checked, total: ids.length });
		}
		return found;
	}
}
