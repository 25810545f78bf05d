import type { ModelDef } from "./ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * One exported file known to the manifest.
 *
 * Keys are `photo:{itemId}:{variant}` for library variants and `file:{relPath}` for folder sources.
 * A row whose `deletedAt` is set is inert until the next upsert revives it.
 */
export interface ManifestEntry {
	readonly key: string;
	/** POSIX path relative to the destination root */
	readonly relPath: string;
	/** Change signature; equality means "nothing to re-export" */
	readonly signature: string;
	readonly size: number;
	/** Modification time of the exported file, epoch seconds */
	readonly mtime: number;
	readonly lastSeenRunId: string;
	readonly deletedAt: Date | null;
}

export type NewManifestEntry = Omit<ManifestEntry, "deletedAt">;

const schema = {
	key: {
		type: DataTypes.STRING(1024),
		primaryKey: true,
	},
	relPath: {
		type: DataTypes.TEXT,
		allowNull: false,
	},
	signature: {
		type: DataTypes.TEXT,
		allowNull: false,
	},
	size: {
		// int8 comes back from the driver as a string; the DAO converts it
		type: DataTypes.BIGINT,
		allowNull: false,
		defaultValue: 0,
	},
	mtime: {
		type: DataTypes.BIGINT,
		allowNull: false,
		defaultValue: 0,
	},
	lastSeenRunId: {
		type: DataTypes.STRING,
		allowNull: false,
	},
	deletedAt: {
		type: DataTypes.DATE,
		allowNull: true,
	},
};

const indexes = [
	{
		// mirror deletion scans by run id
		fields: ["last_seen_run_id"],
	},
];

export function defineManifestEntries(sequelize: Sequelize): ModelDef<ManifestEntry> {
	return sequelize.define("entry", schema, {
		tableName: "entries",
		timestamps: false,
		indexes,
	});
}
