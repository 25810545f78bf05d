// Session Commands Module
// Inspect and discard the saved paused-run session

import { getConfig } from "../../shared/config";
import { createSessionStore, type RunSession } from "../../sync/Session";
import { withErrorExit } from "./shared";
import type { Command } from "commander";

export function describeSession(session: RunSession): Array<string> {
	const snapshot = session.configSnapshot;
	const lines = [
		`Session ${session.sessionId}`,
		`  started:   ${session.startedAt.toISOString()}`,
		`  processed: ${session.processedAssetIds.length}${session.totalAssetsAtPause === undefined ? "" : ` of ${session.totalAssetsAtPause}`}`,
		`  errors:    ${session.errorAssetIds.length}`,
		`  mode:      ${snapshot.mode}, ${snapshot.media}, ${snapshot.sortOrder} first, ${snapshot.backupMode}`,
	];
	if (session.pausedAt) {
		lines.splice(2, 0, `  paused:    ${session.pausedAt.toISOString()}`);
	}
	if (snapshot.folderDestination) {
		lines.push(`  folder:    ${snapshot.folderDestination}`);
	}
	if (snapshot.serverUrl) {
		lines.push(`  server:    ${snapshot.serverUrl} (${snapshot.deviceId ?? "no device id"})`);
	}
	return lines;
}

async function showSession(): Promise<void> {
	const session = await createSessionStore(getConfig().PHOTOSYNC_STATE_DIR).load();
	if (!session) {
		console.log("No saved session");
		return;
	}
	for (const line of describeSession(session)) {
		console.log(line);
	}
}

async function clearSession(): Promise<void> {
	await createSessionStore(getConfig().PHOTOSYNC_STATE_DIR).clear();
	console.log("Session cleared");
}

/**
 * Registers `session show|clear`.
 */
export function registerSessionCommands(program: Command): void {
	const sessionCommand = program.command("session").description("Inspect the saved paused-run session");
	sessionCommand.command("show").description("Show the saved session").action(withErrorExit(showSession));
	sessionCommand.command("clear").description("Discard the saved session").action(withErrorExit(clearSession));
}
