import { defineManifestEntries, type ManifestEntry, type NewManifestEntry } from "./ManifestEntry";
import { Op, type Sequelize } from "sequelize";

/**
 * Manifest DAO: incremental-change records of everything exported to a destination.
 */
export interface ManifestDao {
	/**
	 * Looks up an entry, including soft-deleted ones.
	 * @returns The entry if present, undefined otherwise.
	 */
	get(key: string): Promise<ManifestEntry | undefined>;

	/**
	 * Inserts or replaces an entry and clears its deletion mark.
	 */
	upsert(entry: NewManifestEntry): Promise<void>;

	/**
	 * Records that a run saw the entry without re-exporting it.
	 */
	touch(key: string, runId: string): Promise<void>;

	/**
	 * Soft-deletes an entry. No-op for unknown keys.
	 */
	markDeleted(key: string): Promise<void>;

	/**
	 * Active entries whose last run differs from `runId`, optionally restricted to a key prefix.
	 */
	keysNotTouchedByRun(runId: string, prefix?: string): Promise<Array<Pick<ManifestEntry, "key" | "relPath">>>;

	/**
	 * Resolves once every write accepted so far has settled.
	 */
	flush(): Promise<void>;
}

export function createManifestDao(sequelize: Sequelize): ManifestDao {
	const Entries = defineManifestEntries(sequelize);
	let writeChain: Promise<void> = Promise.resolve();

	return {
		get,
		upsert,
		touch,
		markDeleted,
		keysNotTouchedByRun,
		flush,
	};

	// Writes are queued one after another so concurrent callers never interleave statements.
	function serialize(write: () => Promise<void>): Promise<void> {
		const next = writeChain.then(write);
		writeChain = next.catch(() => undefined);
		return next;
	}

	async function get(key: string): Promise<ManifestEntry | undefined> {
		const entry = await Entries.findByPk(key);
		if (!entry) {
			return;
		}
		const plain = entry.get({ plain: true });
		return { ...plain, size: Number(plain.size), mtime: Number(plain.mtime) };
	}

	function upsert(entry: NewManifestEntry): Promise<void> {
		return serialize(async () => {
			await Entries.upsert({ ...entry, deletedAt: null });
		});
	}

	function touch(key: string, runId: string): Promise<void> {
		return serialize(async () => {
			await Entries.update({ lastSeenRunId: runId }, { where: { key } });
		});
	}

	function markDeleted(key: string): Promise<void> {
		return serialize(async () => {
			await Entries.update({ deletedAt: new Date() }, { where: { key, deletedAt: null } });
		});
	}

	async function keysNotTouchedByRun(
		runId: string,
		prefix?: string,
	): Promise<Array<Pick<ManifestEntry, "key" | "relPath">>> {
		await flush();
		const where = prefix
			? { deletedAt: null, lastSeenRunId: { [Op.ne]: runId }, key: { [Op.startsWith]: prefix } }
			: { deletedAt: null, lastSeenRunId: { [Op.ne]: runId } };
		const entries = await Entries.findAll({
			where,
			attributes: ["key", "relPath"],
			order: [["key", "ASC"]],
		});
		return entries.map(entry => ({ key: entry.key, relPath: entry.relPath }));
	}

	function flush(): Promise<void> {
		return writeChain;
	}
}
