import { getLog, logError } from "../shared/logger";
import type { CandidateItem, RunResult, SyncOptions } from "./Types";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";

const log = getLog(import.meta);

export const SESSION_FILE = "session_state.json";

// =============================================================================
// Schemas
// =============================================================================

export const ConfigSnapshotSchema = z.object({
	mode: z.enum(["originals", "edited", "both"]),
	media: z.enum(["all", "images", "videos"]),
	sortOrder: z.enum(["oldest", "newest"]),
	backupMode: z.enum(["full", "smartIncremental", "mirror"]),
	serverUrl: z.string().optional(),
	deviceId: z.string().optional(),
	folderDestination: z.string().optional(),
});

export const RunSessionSchema = z.object({
	sessionId: z.string(),
	startedAt: z.coerce.date(),
	lastUpdatedAt: z.coerce.date(),
	pausedAt: z.coerce.date().optional(),
	processedAssetIds: z.array(z.string()),
	errorAssetIds: z.array(z.string()),
	pauseIndex: z.number().int().nonnegative().optional(),
	totalAssetsAtPause: z.number().int().nonnegative().optional(),
	configSnapshot: ConfigSnapshotSchema,
	stats: z.object({
		uploaded: z.number().int().nonnegative(),
		skipped: z.number().int().nonnegative(),
		error: z.number().int().nonnegative(),
	}),
});

// =============================================================================
// Inferred Types
// =============================================================================

export type ConfigSnapshot = z.infer<typeof ConfigSnapshotSchema>;
export type RunSession = z.infer<typeof RunSessionSchema>;

export interface SessionStore {
	readonly path: string;
	/** The saved session, or undefined when there is none or it cannot be read. */
	load(): Promise<RunSession | undefined>;
	save(session: RunSession): Promise<void>;
	clear(): Promise<void>;
}

export function createSessionStore(stateDir: string): SessionStore {
	const path = join(stateDir, SESSION_FILE);

	return {
		path,
		async load() {
			let raw: string;
			try {
				raw = await readFile(path, "utf-8");
			} catch (err) {
				if (err instanceof Error && "code" in err && err.code === "ENOENT") {
					return;
				}
				throw err;
			}
			try {
				return RunSessionSchema.parse(JSON.parse(raw));
			} catch (err) {
				logError(log, err, `Ignoring unreadable session ${path}`);
				return;
			}
		},
		async save(session) {
			await mkdir(stateDir, { recursive: true });
			const tmp = `${path}.tmp`;
			await writeFile(tmp, `${JSON.stringify(session, null, 2)}\n`);
			await rename(tmp, path);
			log.debug("saved session %s (%d processed)", session.sessionId, session.processedAssetIds.length);
		},
		async clear() {
			await rm(path, { force: true });
		},
	};
}

export function configSnapshotOf(options: SyncOptions): ConfigSnapshot {
	return {
		mode: options.mode,
		media: options.media,
		sortOrder: options.sortOrder,
		backupMode: options.backupMode,
		serverUrl: options.upload?.serverUrl,
		deviceId: options.upload?.pipeline.deviceId,
		folderDestination: options.folderDestination,
	};
}

function sameSnapshot(a: ConfigSnapshot, b: ConfigSnapshot): boolean {
	return (
		a.mode === b.mode &&
		a.media === b.media &&
		a.sortOrder === b.sortOrder &&
		a.backupMode === b.backupMode &&
		a.serverUrl === b.serverUrl &&
		a.deviceId === b.deviceId &&
		a.folderDestination === b.folderDestination
	);
}

/**
 * A session resumes only into the configuration it was paused under.
 */
export function isResumable(session: RunSession, options: SyncOptions): boolean {
	return sameSnapshot(session.configSnapshot, configSnapshotOf(options));
}

export interface BuildSessionInput {
	sessionId: string;
	startedAt: Date;
	options: SyncOptions;
	result: RunResult;
	total: number;
	/** Uploads finished by this leg of the run */
	uploaded: number;
	/** Totals of the legs before this one, when resuming */
	previous?: RunSession["stats"];
	now?: Date;
}

export function buildSession(input: BuildSessionInput): RunSession {
	const now = input.now ?? new Date();
	const { result } = input;
	const previous = input.previous ?? { uploaded: 0, skipped: 0, error: 0 };
	return {
		sessionId: input.sessionId,
		startedAt: input.startedAt,
		lastUpdatedAt: now,
		pausedAt: result.wasPaused ? now : undefined,
		processedAssetIds: [...result.processedIds],
		errorAssetIds: [...result.errorIds],
		pauseIndex: result.pauseIndex,
		totalAssetsAtPause: result.wasPaused ? input.total : undefined,
		configSnapshot: configSnapshotOf(input.options),
		stats: {
			uploaded: previous.uploaded + input.uploaded,
			skipped: previous.skipped + result.skipped,
			error: previous.error + result.errorCount,
		},
	};
}

export interface ResumeOrder {
	items: Array<CandidateItem>;
	newer: number;
	remaining: number;
	message: string;
}

/**
 * Drops processed items and puts unprocessed items captured after the pause first, each group in
 * candidate order.
 */
export function reorderForResume(items: ReadonlyArray<CandidateItem>, session: RunSession): ResumeOrder {
	const processed = new Set(session.processedAssetIds);
	const pausedAt = session.pausedAt?.getTime();
	const unprocessed = items.filter(item => !processed.has(item.id));
	const isNewer = (item: CandidateItem) =>
		pausedAt !== undefined && item.createdAt !== undefined && item.createdAt.getTime() > pausedAt;

	const newer = unprocessed.filter(isNewer);
	const rest = unprocessed.filter(item => !isNewer(item));
	const message =
		newer.length > 0
			? `Resuming: ${newer.length} newer photo(s), ${rest.length} remaining`
			: `Resuming: ${rest.length} remaining photo(s)`;
	return { items: [...newer, ...rest], newer: newer.length, remaining: rest.length, message };
}
