// Failed Upload Commands Module
// Lists and clears the records of uploads that failed

import { getConfig } from "../../shared/config";
import { clearFailedUploads, listFailedUploads } from "../../upload/FailedUploadArchive";
import { withErrorExit } from "./shared";
import type { Command } from "commander";

type ListFlags = {
	json: boolean;
};

async function listFailed(flags: ListFlags): Promise<void> {
	const records = await listFailedUploads(getConfig().PHOTOSYNC_STATE_DIR);
	if (flags.json) {
		console.log(JSON.stringify(records, null, 2));
		return;
	}
	if (records.length === 0) {
		console.log("No failed uploads");
		return;
	}
	for (const { sessionId, record } of records) {
		console.log(`${sessionId}  ${record.deviceAssetId}  ${record.filename}: ${record.errorDescription}`);
	}
}

async function clearFailed(sessionId: string | undefined): Promise<void> {
	const removed = await clearFailedUploads(getConfig().PHOTOSYNC_STATE_DIR, sessionId);
	console.log(`Removed ${removed} record(s)`);
}

/**
 * Registers `failed list|clear`.
 */
export function registerFailedCommands(program: Command): void {
	const failedCommand = program.command("failed").description("Inspect uploads that failed");
	failedCommand
		.command("list")
		.description("List failed uploads of every session")
		.option("-j, --json", "Output as JSON", false)
		.action(withErrorExit(listFailed));
	failedCommand
		.command("clear [sessionId]")
		.description("Delete failed-upload records of one session, or all")
		.action(withErrorExit(clearFailed));
}
