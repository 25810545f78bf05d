import { UploadMetadataSchema } from "../remote/types";
import { getLog, logError } from "../shared/logger";
import { mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";

const log = getLog(import.meta);

export const FAILED_UPLOADS_DIR = "failed-uploads";

export const FailedUploadRecordSchema = z.object({
	savedAt: z.string(),
	deviceId: z.string(),
	deviceAssetId: z.string(),
	localIdentifier: z.string().optional(),
	filename: z.string(),
	fileCreatedAt: z.string(),
	fileModifiedAt: z.string(),
	durationSeconds: z.number().optional(),
	isFavorite: z.boolean().optional(),
	livePhotoVideoId: z.string().optional(),
	metadata: UploadMetadataSchema,
	errorDescription: z.string(),
});

export type FailedUploadRecord = z.infer<typeof FailedUploadRecordSchema>;

export type StoredFailedUpload = {
	sessionId: string;
	file: string;
	record: FailedUploadRecord;
};

/**
 * Metadata-only records of uploads that failed during one session.
 */
export interface FailedUploadArchive {
	readonly dir: string;
	/** Writes the record; failures are logged and never thrown. */
	record(record: Omit<FailedUploadRecord, "savedAt">): Promise<void>;
}

export function failedUploadsRoot(stateDir: string): string {
	return join(stateDir, FAILED_UPLOADS_DIR);
}

export function recordFileName(deviceAssetId: string): string {
	return `${deviceAssetId.replace(/[^A-Za-z0-9._-]/g, "_")}.json`;
}

export function createFailedUploadArchive(stateDir: string, sessionId: string): FailedUploadArchive {
	const dir = join(failedUploadsRoot(stateDir), sessionId);

	return {
		dir,
		async record(input) {
			const record: FailedUploadRecord = { savedAt: new Date().toISOString(), ...input };
			const path = join(dir, recordFileName(input.deviceAssetId));
			try {
				await mkdir(dir, { recursive: true });
				await writeFile(path, `${JSON.stringify(record, null, 2)}\n`);
				log.debug("recorded failed upload %s", path);
			} catch (err) {
				logError(log, err, `Could not record failed upload ${input.deviceAssetId}`);
			}
		},
	};
}

/**
 * Reads every record under the state directory. Unreadable files are logged and skipped.
 */
export async function listFailedUploads(stateDir: string): Promise<Array<StoredFailedUpload>> {
	const root = failedUploadsRoot(stateDir);
	const sessions = await readdir(root, { withFileTypes: true }).catch((err: unknown) => {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") {
			return [];
		}
		throw err;
	});

	const out: Array<StoredFailedUpload> = [];
	for (const session of sessions) {
		if (!session.isDirectory()) {
			continue;
		}
		const sessionDir = join(root, session.name);
		const files = (await readdir(sessionDir)).filter(name => name.endsWith(".json")).sort();
		for (const file of files) {
			const path = join(sessionDir, file);
			try {
				const record = FailedUploadRecordSchema.parse(JSON.parse(await readFile(path, "utf-8")));
				out.push({ sessionId: session.name, file: path, record });
			} catch (err) {
				logError(log, err, `Skipping unreadable failed-upload record ${path}`);
			}
		}
	}
	return out;
}

/**
 * Deletes the records of one session, or all of them. Returns how many records were removed.
 */
export async function clearFailedUploads(stateDir: string, sessionId?: string): Promise<number> {
	const records = await listFailedUploads(stateDir);
	const doomed = sessionId ? records.filter(r => r.sessionId === sessionId) : records;
	const target = sessionId ? join(failedUploadsRoot(stateDir), sessionId) : failedUploadsRoot(stateDir);
	await rm(target, { recursive: true, force: true });
	return doomed.length;
}
