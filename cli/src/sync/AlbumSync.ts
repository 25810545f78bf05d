import type { RemoteStoreClient } from "../remote/RemoteClient";
import { errorMessage } from "../shared/logger";
import { shortId } from "./Naming";
import type { AlbumRef } from "./Types";

export const ALBUM_CHUNK_SIZE = 500;

export interface AlbumEntry {
	album: AlbumRef;
	assetIds: Array<string>;
}

/**
 * Remote asset ids per source album, filled in as uploads report their ids.
 */
export interface AlbumCollector {
	add(assetId: string, albums: ReadonlyArray<AlbumRef>): void;
	/** Albums with at least one asset, in the order they were first seen. */
	snapshot(): Array<AlbumEntry>;
}

export function createAlbumCollector(): AlbumCollector {
	const byAlbum = new Map<string, { album: AlbumRef; assetIds: Set<string> }>();

	return {
		add(assetId, albums) {
			for (const album of albums) {
				const entry = byAlbum.get(album.id) ?? { album, assetIds: new Set<string>() };
				entry.assetIds.add(assetId);
				byAlbum.set(album.id, entry);
			}
		},
		snapshot() {
			return [...byAlbum.values()].map(({ album, assetIds }) => ({ album, assetIds: [...assetIds] }));
		},
	};
}

/**
 * Remote album name for each entry. Titles shared by several source albums get the album's short id.
 */
export function remoteAlbumNames(entries: ReadonlyArray<AlbumEntry>): Map<string, string> {
	const titleCounts = new Map<string, number>();
	for (const { album } of entries) {
		titleCounts.set(album.title, (titleCounts.get(album.title) ?? 0) + 1);
	}
	return new Map(
		entries.map(({ album }) => [
			album.id,
			(titleCounts.get(album.title) ?? 0) > 1 ? `${album.title} (Photos ${shortId(album.id)})` : album.title,
		]),
	);
}

export function chunk<T>(items: ReadonlyArray<T>, size: number): Array<Array<T>> {
	const out: Array<Array<T>> = [];
	for (let i = 0; i < items.length; i += size) {
		out.push(items.slice(i, i + size));
	}
	return out;
}

export interface AlbumSyncOptions {
	client: RemoteStoreClient;
	entries: ReadonlyArray<AlbumEntry>;
	shouldCancel: () => boolean;
	onMessage: (text: string) => void;
	chunkSize?: number;
}

export interface AlbumSyncResult {
	created: number;
	added: number;
}

/**
 * Mirrors source album membership onto the remote store: reuses albums by name, creates the missing
 * ones and adds assets in chunks. Failures are reported per album and never abort the sync.
 */
export async function syncAlbums(options: AlbumSyncOptions): Promise<AlbumSyncResult> {
	const { client, entries, onMessage } = options;
	const result: AlbumSyncResult = { created: 0, added: 0 };
	if (entries.length === 0) {
		return result;
	}
	onMessage("Remote: syncing albums...");

	const idByName = new Map<string, string>();
	try {
		for (const album of await client.listAlbums()) {
			if (album.albumName) {
				idByName.set(album.albumName, album.id);
			}
		}
	} catch (err) {
		onMessage(`ERROR Remote: could not list albums: ${errorMessage(err)}`);
	}

	const names = remoteAlbumNames(entries);
	for (const entry of entries) {
		if (options.shouldCancel()) {
			break;
		}
		const name = names.get(entry.album.id) ?? entry.album.title;
		let albumId = idByName.get(name);
		if (!albumId) {
			try {
				albumId = (await client.createAlbum(name)).id;
				idByName.set(name, albumId);
				result.created++;
				onMessage(`Remote: created album "${name}"`);
			} catch (err) {
				onMessage(`ERROR Remote: could not create album "${name}": ${errorMessage(err)}`);
				continue;
			}
		}

		for (const ids of chunk(entry.assetIds, options.chunkSize ?? ALBUM_CHUNK_SIZE)) {
			if (options.shouldCancel()) {
				break;
			}
			try {
				await client.addAssetsToAlbum(albumId, ids);
				result.added += ids.length;
			} catch (err) {
				onMessage(`ERROR Remote: could not add assets to album "${name}": ${errorMessage(err)}`);
				break;
			}
		}
	}

	onMessage("Remote: album sync complete");
	return result;
}
