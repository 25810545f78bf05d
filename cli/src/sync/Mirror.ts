import type { ManifestDao } from "../manifest/ManifestDao";
import { errorMessage, getLog } from "../shared/logger";
import { pathExists } from "./Placement";
import { rm } from "node:fs/promises";
import { join } from "node:path";

const log = getLog(import.meta);

export interface MirrorDeletionOptions {
	manifest: ManifestDao;
	destination: string;
	runId: string;
	/** `photo:` or `file:` */
	prefix: string;
	shouldCancel: () => boolean;
	onMessage: (text: string) => void;
}

/**
 * Removes outputs whose manifest entries this run did not touch, then soft-deletes the entries.
 * An entry whose file is already gone is only soft-deleted. Returns the number of entries retired.
 */
export async function deleteOrphans(options: MirrorDeletionOptions): Promise<number> {
	const { manifest, destination } = options;
	const orphans = await manifest.keysNotTouchedByRun(options.runId, options.prefix);
	log.debug("mirror: %d orphan(s) under %s", orphans.length, options.prefix);

	let deleted = 0;
	for (const orphan of orphans) {
		if (options.shouldCancel()) {
			break;
		}
		const path = join(destination, orphan.relPath);
		try {
			if (await pathExists(path)) {
				await rm(path);
				options.onMessage(`Mirror: deleted ${orphan.relPath}`);
			}
			await manifest.markDeleted(orphan.key);
			deleted++;
		} catch (err) {
			options.onMessage(`ERROR Mirror: failed to delete ${orphan.relPath}: ${errorMessage(err)}`);
		}
	}
	return deleted;
}
