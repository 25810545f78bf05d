import { getLog } from "../shared/logger";
import { createManifestDao, type ManifestDao } from "./ManifestDao";
import { PGlite } from "@electric-sql/pglite";
import { PGLiteSocketServer } from "@electric-sql/pglite-socket";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { Sequelize } from "sequelize";

const log = getLog(import.meta);

export const MANIFEST_DIR = ".photosync";
export const MANIFEST_DATA_DIR = "manifest";

// Loopback ports tried in order for the socket the ORM connects through
const FIRST_PORT = 5434;
const LAST_PORT = 5533;

export type Manifest = ManifestDao & {
	/** PGlite data directory */
	readonly path: string;
	close(): Promise<void>;
};

export function manifestPath(destination: string): string {
	return join(destination, MANIFEST_DIR, MANIFEST_DATA_DIR);
}

async function startSocketServer(db: PGlite): Promise<{ server: PGLiteSocketServer; port: number }> {
	for (let port = FIRST_PORT; port <= LAST_PORT; port++) {
		try {
			const server = new PGLiteSocketServer({ db, port, host: "127.0.0.1" });
			await server.start();
			return { server, port };
		} catch (error) {
			if (port === LAST_PORT || !(error instanceof Error && error.message.includes("EADDRINUSE"))) {
				throw error;
			}
		}
	}
	throw new Error(`No free port for the manifest socket in ${FIRST_PORT}-${LAST_PORT}`);
}

/**
 * Opens (creating when needed) the manifest database kept inside a destination folder.
 *
 * The store is an embedded Postgres (PGlite) persisted under `.photosync/manifest`; commits go through
 * its write-ahead log, so a crash never loses entries that were already committed.
 */
export async function openManifest(destination: string): Promise<Manifest> {
	const path = manifestPath(destination);
	await mkdir(path, { recursive: true });

	const db = new PGlite(path);
	const { server, port } = await startSocketServer(db);

	const sequelize = new Sequelize({
		username: "postgres",
		password: "postgres",
		database: "postgres",
		host: "127.0.0.1",
		port,
		dialect: "postgres",
		dialectOptions: { ssl: false },
		logging: sql => log.trace(sql),
		pool: { max: 1, min: 0, idle: 0 },
		define: { underscored: true },
	});

	try {
		const dao = createManifestDao(sequelize);
		await sequelize.sync();
		log.debug("manifest opened at %s (port %d)", path, port);

		return {
			...dao,
			path,
			async close() {
				try {
					await dao.flush();
					await sequelize.close();
				} finally {
					await server.stop();
					await db.close();
				}
			},
		};
	} catch (error) {
		await sequelize.close();
		await server.stop();
		await db.close();
		throw error;
	}
}
