// Run Command Module
// Exports a library directory to a folder and/or the remote store

import { type Config, getConfig } from "../../shared/config";
import { getLog } from "../../shared/logger";
import { createDirectoryAssetSource } from "../../source/DirectoryAssetSource";
import { createRunControl } from "../../sync/RunControl";
import { createSessionStore } from "../../sync/Session";
import { createSyncOrchestrator } from "../../sync/SyncOrchestrator";
import type { RunResult, SyncOptions } from "../../sync/Types";
import { createProgressPrinter } from "../ProgressPrinter";
import { attachInterruptHandler, resolveServerTarget, withErrorExit } from "./shared";
import { join } from "node:path";
import { type Command, Option } from "commander";
import { z } from "zod";

const logger = getLog(import.meta);

export const TEMP_DIR_NAME = "tmp";

export const RunCommandOptionsSchema = z.object({
	dest: z.string().optional(),
	upload: z.boolean().default(false),
	server: z.string().url().optional(),
	apiKey: z.string().optional(),
	mode: z.enum(["originals", "edited", "both"]).default("originals"),
	media: z.enum(["all", "images", "videos"]).default("all"),
	since: z.coerce.date().optional(),
	limit: z.coerce.number().int().positive().optional(),
	order: z.enum(["oldest", "newest"]).default("oldest"),
	album: z.array(z.string()).optional(),
	backup: z.enum(["full", "smartIncremental", "mirror"]).default("smartIncremental"),
	adjustments: z.boolean().default(false),
	dryRun: z.boolean().default(false),
	resume: z.boolean().default(false),
	syncAlbums: z.boolean().default(false),
	updateChanged: z.boolean().default(false),
	checksumPrecheck: z.boolean().default(true),
	skipHash: z.boolean().default(false),
});

export type RunCommandOptions = z.infer<typeof RunCommandOptionsSchema>;

/**
 * Orchestrator options from parsed flags and the configuration.
 */
export function buildSyncOptions(flags: RunCommandOptions, config: Config): SyncOptions {
	const wantsUpload = flags.upload || flags.server !== undefined;
	const target = wantsUpload ? resolveServerTarget(flags, config) : undefined;

	return {
		mode: flags.mode,
		media: flags.media,
		since: flags.since,
		limit: flags.limit,
		sortOrder: flags.order,
		albumScope: flags.album && flags.album.length > 0 ? { albumIds: flags.album } : "all",
		backupMode: flags.backup,
		includeAdjustmentData: flags.adjustments,
		dryRun: flags.dryRun,
		folderDestination: flags.dest,
		upload: target && {
			...target,
			pipeline: {
				deviceId: config.PHOTOSYNC_DEVICE_ID,
				uploadConcurrency: config.UPLOAD_CONCURRENCY,
				hashConcurrency: config.HASH_CONCURRENCY,
				checksumPrecheck: flags.checksumPrecheck,
				skipHash: flags.skipHash,
				bulkCheckBatchSize: config.BULK_CHECK_BATCH_SIZE,
				existBatchSize: config.EXIST_BATCH_SIZE,
				syncAlbums: flags.syncAlbums,
				updateChangedAssets: flags.updateChanged,
			},
		},
		retry: {
			maxRetries: config.RETRY_MAX,
			baseDelayMs: config.RETRY_BASE_DELAY,
			maxDelayMs: config.RETRY_MAX_DELAY,
			jitter: true,
		},
		requestTimeoutMs: config.REQUEST_TIMEOUT,
		downloadTimeoutMultiplier: config.DOWNLOAD_TIMEOUT_MULTIPLIER,
		tempDir: join(config.PHOTOSYNC_STATE_DIR, TEMP_DIR_NAME),
		stateDir: config.PHOTOSYNC_STATE_DIR,
	};
}

export function formatRunSummary(result: RunResult): string {
	const parts = [
		`${result.completed} exported`,
		`${result.skipped} skipped`,
		`${result.errorCount} error(s)`,
	];
	if (result.mirrorDeleted > 0) {
		parts.push(`${result.mirrorDeleted} removed`);
	}
	const summary = `Done: ${parts.join(", ")}`;
	return result.wasPaused ? `${summary} (paused)` : summary;
}

async function runLibrary(library: string, rawFlags: unknown): Promise<void> {
	const flags = RunCommandOptionsSchema.parse(rawFlags);
	const options = buildSyncOptions(flags, getConfig());

	const sessions = createSessionStore(options.stateDir);
	const session = flags.resume ? await sessions.load() : undefined;
	if (flags.resume && !session) {
		console.log("No saved session; starting from the beginning");
	}

	const control = createRunControl();
	const detach = attachInterruptHandler(control);
	try {
		const orchestrator = createSyncOrchestrator({ source: createDirectoryAssetSource(library) });
		const result = await orchestrator.run(options, createProgressPrinter(), control, session);
		logger.debug("run %s: %d processed", result.runId, result.processedIds.length);
		console.log(formatRunSummary(result));
		if (result.errorCount > 0) {
			process.exitCode = 1;
		}
	} finally {
		detach();
	}
}

/**
 * Registers the `run` command.
 */
export function registerRunCommand(program: Command): void {
	program
		.command("run <library>")
		.description("Export a library directory to a folder and/or the remote store")
		.option("-d, --dest <dir>", "Destination folder")
		.option("-u, --upload", "Upload to the configured server", false)
		.option("--server <url>", "Server URL (implies --upload)")
		.option("--api-key <key>", "API key for the server")
		.addOption(new Option("--mode <mode>", "What to export").choices(["originals", "edited", "both"]).default("originals"))
		.addOption(new Option("--media <media>", "Media kinds").choices(["all", "images", "videos"]).default("all"))
		.option("--since <date>", "Only items captured on or after this date")
		.option("--limit <count>", "Process at most this many items")
		.addOption(new Option("--order <order>", "Capture-date order").choices(["oldest", "newest"]).default("oldest"))
		.option("--album <ids...>", "Only items in these albums")
		.addOption(
			new Option("--backup <mode>", "Backup mode")
				.choices(["full", "smartIncremental", "mirror"])
				.default("smartIncremental"),
		)
		.option("--adjustments", "Also export adjustment data", false)
		.option("--dry-run", "Show what would be exported without writing", false)
		.option("--resume", "Continue the saved session when it matches these options", false)
		.option("--sync-albums", "Mirror album membership on the server", false)
		.option("--update-changed", "Replace server assets that already exist", false)
		.option("--no-checksum-precheck", "Skip the checksum duplicate check before uploading")
		.option("--skip-hash", "Do not hash files before uploading", false)
		.action(withErrorExit(runLibrary));
}
