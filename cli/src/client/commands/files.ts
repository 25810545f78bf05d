// Files Command Module
// Backs up plain folders to a destination folder and/or the remote store

import { type Config, getConfig } from "../../shared/config";
import { type FolderBackupOptions, type FolderBackupResult, runFolderBackup } from "../../sync/FolderBackup";
import { createRunControl } from "../../sync/RunControl";
import { createProgressPrinter } from "../ProgressPrinter";
import { attachInterruptHandler, resolveServerTarget, withErrorExit } from "./shared";
import { type Command, Option } from "commander";
import { z } from "zod";

export const FilesCommandOptionsSchema = z.object({
	dest: z.string().optional(),
	upload: z.boolean().default(false),
	server: z.string().url().optional(),
	apiKey: z.string().optional(),
	backup: z.enum(["full", "smartIncremental", "mirror"]).default("smartIncremental"),
	hidden: z.boolean().default(false),
	followSymlinks: z.boolean().default(false),
	dryRun: z.boolean().default(false),
	updateChanged: z.boolean().default(false),
});

export type FilesCommandOptions = z.infer<typeof FilesCommandOptionsSchema>;

export function buildFolderBackupOptions(
	sources: Array<string>,
	flags: FilesCommandOptions,
	config: Config,
): FolderBackupOptions {
	const wantsUpload = flags.upload || flags.server !== undefined;
	const target = wantsUpload ? resolveServerTarget(flags, config) : undefined;
	return {
		sources,
		destination: flags.dest,
		backupMode: flags.backup,
		includeHiddenFiles: flags.hidden,
		followSymlinks: flags.followSymlinks,
		dryRun: flags.dryRun,
		upload: target && {
			...target,
			deviceId: config.PHOTOSYNC_DEVICE_ID,
			existBatchSize: config.EXIST_BATCH_SIZE,
			updateChanged: flags.updateChanged,
		},
		requestTimeoutMs: config.REQUEST_TIMEOUT,
	};
}

export function formatFilesSummary(result: FolderBackupResult): string {
	return (
		`Done: ${result.scanned} scanned, ${result.copied} copied, ${result.uploaded} uploaded, ` +
		`${result.replaced} replaced, ${result.skipped} skipped, ${result.deleted} removed, ${result.errorCount} error(s)`
	);
}

async function backupFolders(sources: Array<string>, rawFlags: unknown): Promise<void> {
	const flags = FilesCommandOptionsSchema.parse(rawFlags);
	const options = buildFolderBackupOptions(sources, flags, getConfig());
	const control = createRunControl();
	const detach = attachInterruptHandler(control);
	try {
		const result = await runFolderBackup(options, createProgressPrinter(), control);
		console.log(formatFilesSummary(result));
		if (result.errorCount > 0) {
			process.exitCode = 1;
		}
	} finally {
		detach();
	}
}

/**
 * Registers the `files` command.
 */
export function registerFilesCommand(program: Command): void {
	program
		.command("files <sources...>")
		.description("Back up folders to a destination folder and/or the remote store")
		.option("-d, --dest <dir>", "Destination folder")
		.option("-u, --upload", "Upload to the configured server", false)
		.option("--server <url>", "Server URL (implies --upload)")
		.option("--api-key <key>", "API key for the server")
		.addOption(
			new Option("--backup <mode>", "Backup mode")
				.choices(["full", "smartIncremental", "mirror"])
				.default("smartIncremental"),
		)
		.option("--hidden", "Include hidden files", false)
		.option("--follow-symlinks", "Follow symbolic links", false)
		.option("--dry-run", "Count what would be copied without writing", false)
		.option("--update-changed", "Replace files the server already has", false)
		.action(withErrorExit(backupFolders));
}
