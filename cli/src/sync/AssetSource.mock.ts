import { RESOURCE_TYPES } from "../source/DirectoryAssetSource";
import type { AlbumRef, AssetSource, CandidateItem, MediaKind, Variant, VariantType } from "./Types";
import { writeFile } from "node:fs/promises";

export type MemoryItemInit = {
	id: string;
	createdAt?: Date;
	modifiedAt?: Date;
	kind?: MediaKind;
	albums?: Array<AlbumRef>;
	/** Bytes per variant; `original` defaults to `content of {id}` for images */
	contents?: Partial<Record<VariantType, string>>;
	isFavorite?: boolean;
	durationSeconds?: number;
};

const EXTENSIONS: Record<VariantType, string> = {
	original: "JPG",
	pairedVideo: "MOV",
	video: "MOV",
	adjustments: "AAE",
};

export type MemorySource = AssetSource & {
	items: Array<CandidateItem>;
	/** Bytes served per `{itemId}:{variant}`; replace entries to simulate edits */
	contents: Map<string, string>;
	/** Fails the next `count` fetches of a variant with `error` */
	failNext: (itemId: string, variant: VariantType | "edited", error: Error, count?: number) => void;
	/** `{itemId}:{variant}` of every fetch attempt, in order */
	fetches: Array<string>;
};

export function memoryItem(init: MemoryItemInit): { item: CandidateItem; contents: Map<string, string> } {
	const kind = init.kind ?? "image";
	const contents = init.contents ?? (kind === "image" ? { original: `content of ${init.id}` } : { video: `video of ${init.id}` });
	const variants: Array<Variant> = [];
	const map = new Map<string, string>();
	for (const type of ["original", "pairedVideo", "video", "adjustments"] as const) {
		const content = contents[type];
		if (content !== undefined) {
			variants.push({ type, filename: `${init.id}.${EXTENSIONS[type]}`, resourceType: RESOURCE_TYPES[type] });
			map.set(`${init.id}:${type}`, content);
		}
	}
	return {
		item: {
			id: init.id,
			createdAt: init.createdAt,
			modifiedAt: init.modifiedAt ?? init.createdAt,
			kind,
			isLivePhoto: kind === "image" && contents.pairedVideo !== undefined,
			isFavorite: init.isFavorite,
			durationSeconds: init.durationSeconds,
			variants,
			albums: init.albums ?? [],
		},
		contents: map,
	};
}

export function createMemorySource(inits: Array<MemoryItemInit>): MemorySource {
	const items: Array<CandidateItem> = [];
	const contents = new Map<string, string>();
	for (const init of inits) {
		const built = memoryItem(init);
		items.push(built.item);
		for (const [key, value] of built.contents) {
			contents.set(key, value);
		}
	}
	const faults = new Map<string, { error: Error; remaining: number }>();
	const fetches: Array<string> = [];

	async function serve(key: string, destPath: string, onProgress: (p: number) => void): Promise<void> {
		fetches.push(key);
		const fault = faults.get(key);
		if (fault && fault.remaining > 0) {
			fault.remaining--;
			throw fault.error;
		}
		const content = contents.get(key);
		if (content === undefined) {
			throw Object.assign(new Error(`missing resource ${key}`), { code: "ENOENT" });
		}
		onProgress(0.5);
		await writeFile(destPath, content);
		onProgress(1);
	}

	return {
		items,
		contents,
		fetches,
		failNext(itemId, variant, error, count = 1) {
			faults.set(`${itemId}:${variant}`, { error, remaining: count });
		},
		listItems(filter) {
			return Promise.resolve(
				items.filter(
					item =>
						(filter.media === "all" || (filter.media === "images") === (item.kind === "image")) &&
						(!filter.since || !item.createdAt || item.createdAt >= filter.since),
				),
			);
		},
		exportVariant(item, variant, destPath, onProgress) {
			return serve(`${item.id}:${variant.type}`, destPath, onProgress);
		},
		renderEdited(item, destPath, onProgress) {
			const edited = contents.get(`${item.id}:edited`);
			return serve(`${item.id}:${edited === undefined ? "original" : "edited"}`, destPath, onProgress);
		},
		listAlbums() {
			const albums = new Map(items.flatMap(item => item.albums).map(album => [album.id, album]));
			return Promise.resolve([...albums.values()]);
		},
	};
}
